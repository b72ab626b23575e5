import { readdirSync, readFileSync } from "node:fs";
import _Ajv, { type ValidateFunction } from "ajv";
import _addFormats from "ajv-formats";
import { createRPCError } from "./util.js";

const Ajv = _Ajv.default;
const addFormats = _addFormats.default;

// ─── Validation Error Mapping ───────────────────────────────────

/**
 * Maps AJV validation keywords to OCPP-J RPC error codes, grouped by the
 * OCPP error category that best describes the failure.
 */

/** Keywords indicating the data type itself is wrong */
const TYPE_VIOLATIONS = new Set(["type"]);

/** Keywords indicating cardinality / presence constraints are broken */
const OCCURRENCE_VIOLATIONS = new Set([
  "required",
  "maxItems",
  "minItems",
  "maxProperties",
  "minProperties",
  "additionalProperties",
  "additionalItems",
]);

/** Keywords indicating a property value is not in the allowed set */
const PROPERTY_VIOLATIONS = new Set(["enum", "const"]);

function keywordToOCPPError(keyword: string): string {
  if (TYPE_VIOLATIONS.has(keyword)) return "TypeConstraintViolation";
  if (OCCURRENCE_VIOLATIONS.has(keyword))
    return "OccurrenceConstraintViolation";
  if (PROPERTY_VIOLATIONS.has(keyword)) return "PropertyConstraintViolation";
  // maximum, pattern, format, ...
  return "FormatViolation";
}

// ─── Validator Class ────────────────────────────────────────────

export interface ValidatorSchema {
  $schema?: string;
  $id?: string;
  [key: string]: unknown;
}

export const SchemaId = {
  START_COMMAND: "urn:StartTransactionCommand",
  STOP_COMMAND: "urn:StopTransactionCommand",
  CALL_COMMAND: "urn:CallCommand",
  TRANSACTION_EVENT: "urn:TransactionEvent.req",
  STATUS_NOTIFICATION: "urn:StatusNotification.req",
} as const;

/**
 * JSON schema validator for command bodies and the routing fields of
 * device Calls. Schemas are registered up front and compiled on first use.
 */
export class Validator {
  private _ajv: InstanceType<typeof Ajv>;

  constructor(schemas: ValidatorSchema[]) {
    this._ajv = new Ajv({
      allErrors: true,
      strict: false,
    });
    addFormats(this._ajv);

    for (const schema of schemas) {
      const normalized = { ...schema };
      if (typeof normalized.$id === "string") {
        normalized.$id = this._normalizeSchemaId(normalized.$id);
      }
      this._ajv.addSchema(normalized);
    }
  }

  private _normalizeSchemaId(schemaId: string): string {
    return schemaId.startsWith("urn:")
      ? schemaId.replace("urn:", "urn/")
      : schemaId;
  }

  /**
   * Validate a payload against the schema with this $id. Throws a typed
   * RPCError on failure; payloads for unknown schema ids pass.
   */
  validate(schemaId: string, params: unknown): void {
    const validateFn: ValidateFunction | undefined = this._ajv.getSchema(
      this._normalizeSchemaId(schemaId),
    );
    if (!validateFn) return;

    if (!validateFn(params) && validateFn.errors?.length) {
      const [primaryError] = validateFn.errors;
      throw createRPCError(
        keywordToOCPPError(primaryError.keyword),
        this._ajv.errorsText(validateFn.errors),
      );
    }
  }

  /**
   * Like `validate`, but the schema must be registered, and `params` is
   * narrowed to `T` afterwards.
   */
  assert<T>(schemaId: string, params: unknown): asserts params is T {
    if (!this.hasSchema(schemaId)) {
      throw new Error(`No schema registered for ${schemaId}`);
    }
    this.validate(schemaId, params);
  }

  hasSchema(schemaId: string): boolean {
    return !!this._ajv.getSchema(this._normalizeSchemaId(schemaId));
  }
}

// ─── Bundled Schemas ────────────────────────────────────────────

const SCHEMA_DIR = new URL("../schemas/", import.meta.url);

/** Read every `*.json` schema shipped in the package's `schemas/` directory. */
export function loadBundledSchemas(dir: URL = SCHEMA_DIR): ValidatorSchema[] {
  return readdirSync(dir)
    .filter((file) => file.endsWith(".json"))
    .sort()
    .map((file): ValidatorSchema => {
      const parsed: unknown = JSON.parse(
        readFileSync(new URL(file, dir), "utf8"),
      );
      if (
        typeof parsed !== "object" ||
        parsed === null ||
        Array.isArray(parsed)
      ) {
        throw new Error(`Schema ${file} is not a JSON object`);
      }
      return { ...parsed };
    });
}

export function createValidator(
  schemas: ValidatorSchema[] = loadBundledSchemas(),
): Validator {
  return new Validator(schemas);
}
