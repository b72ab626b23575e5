import { isPlainObject } from "../util.js";
import { SchemaId } from "../validator.js";
import type { CallHandler } from "./types.js";

/**
 * Records connector status under
 * `connectors.{evseId}.{connectorId} = {status, timestamp}`.
 */
export const statusNotification: CallHandler = async (ctx) => {
  ctx.validator.validate(SchemaId.STATUS_NOTIFICATION, ctx.payload);
  if (!isPlainObject(ctx.payload)) {
    return { ok: true, payload: {} };
  }

  const { evseId, connectorId, connectorStatus, timestamp } = ctx.payload;
  await ctx.shadow.merge(ctx.deviceId, {
    connectors: {
      [String(evseId)]: {
        [String(connectorId)]: { status: connectorStatus, timestamp },
      },
    },
  });

  return { ok: true, payload: {} };
};
