import pc from "picocolors";
import { DEFAULT_PORT } from "./serve.js";

export const DEFAULT_URL = `http://127.0.0.1:${DEFAULT_PORT}`;

export interface RemoteOptions {
  /** Base URL of a running bridge */
  url?: string;
  /** Hold the request until the device answers */
  wait?: boolean;
  timeout?: number;
}

export interface StartOptions extends RemoteOptions {
  evse?: number;
  type?: string;
  remoteStartId?: number;
}

interface RemoteResponse {
  status: number;
  body: unknown;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function endpoint(options: RemoteOptions, path: string): string {
  const base = (options.url ?? DEFAULT_URL).replace(/\/+$/, "");
  return `${base}${path}${options.wait ? "?wait=true" : ""}`;
}

/** Non-JSON bodies come back as text. */
function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

async function request(
  url: string,
  init?: RequestInit,
): Promise<RemoteResponse> {
  const res = await fetch(url, init);
  return { status: res.status, body: parseBody(await res.text()) };
}

function report(url: string, response: RemoteResponse): void {
  const { status, body } = response;
  if (status >= 200 && status < 300) {
    console.log(`${pc.green("✔")} ${pc.bold(String(status))} ${pc.gray(url)}`);
    console.log(JSON.stringify(body, null, 2));
    return;
  }

  const error = isRecord(body) ? String(body.error) : "Error";
  const message = isRecord(body) ? String(body.message) : String(body);
  console.error(
    `${pc.red("✖")} ${pc.bold(String(status))} ${pc.red(error)}: ${message}`,
  );
  process.exitCode = 1;
}

async function send(url: string, init?: RequestInit): Promise<void> {
  try {
    report(url, await request(url, init));
  } catch (err) {
    console.error(
      pc.red(
        `✖ Could not reach ${url}: ${err instanceof Error ? err.message : String(err)}`,
      ),
    );
    process.exitCode = 1;
  }
}

function post(url: string, body: Record<string, unknown>): Promise<void> {
  return send(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

/** POST /commands/start */
export function runStart(
  deviceId: string,
  idToken: string,
  options: StartOptions = {},
): Promise<void> {
  return post(endpoint(options, "/commands/start"), {
    deviceId,
    idToken,
    evseId: options.evse ?? 1,
    ...(options.type ? { idTokenType: options.type } : {}),
    ...(options.remoteStartId ? { remoteStartId: options.remoteStartId } : {}),
    ...(options.timeout ? { timeoutMs: options.timeout } : {}),
  });
}

/** POST /commands/stop */
export function runStop(
  deviceId: string,
  transactionId: string,
  options: RemoteOptions = {},
): Promise<void> {
  return post(endpoint(options, "/commands/stop"), {
    deviceId,
    transactionId,
    ...(options.timeout ? { timeoutMs: options.timeout } : {}),
  });
}

/** GET /health */
export function runHealth(options: RemoteOptions = {}): Promise<void> {
  return send(endpoint({ url: options.url }, "/health"));
}
