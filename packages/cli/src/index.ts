#!/usr/bin/env node
import { readFileSync } from "node:fs";
import * as p from "@clack/prompts";
import { cac } from "cac";
import { runHealth, runStart, runStop } from "./commands/remote.js";
import { installShutdownHandlers, runServe } from "./commands/serve.js";
import { printBanner } from "./lib/banner.js";

const pkg: unknown = JSON.parse(
  readFileSync(new URL("../package.json", import.meta.url), "utf8"),
);
const version =
  typeof pkg === "object" &&
  pkg !== null &&
  "version" in pkg &&
  typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

const cli = cac("ocpp-bridge");

// ── Serve Command ──────────────────────────────────────────────

cli
  .command("serve", "Run the bridge: device WebSockets plus the command API")
  .option("-p, --port <port>", "Port for WebSockets and HTTP (default: 9220)")
  .option("-H, --host <host>", "Interface to bind (default: all)")
  .option("-c, --config <file>", "JSON config file")
  .option("-d, --devices <ids>", "Comma separated registered device ids")
  .option("-r, --redis <url>", "Redis URL for the backend pub/sub")
  .option("--heartbeat <seconds>", "Heartbeat interval sent to devices")
  .option("--idle-timeout <ms>", "Close sessions idle this long, 0 disables")
  .option("--call-timeout <ms>", "Timeout of Calls sent to devices")
  .option("-l, --log-level <level>", "TRACE | DEBUG | INFO | WARN | ERROR")
  .option("--no-pretty", "Log JSON lines instead of colored output")
  .example("  ocpp-bridge serve --devices CP1,CP2")
  .example("  ocpp-bridge serve -c bridge.json -r redis://localhost:6379")
  .action(
    async (options: {
      port?: number;
      host?: string;
      config?: string;
      devices?: string;
      redis?: string;
      heartbeat?: number;
      idleTimeout?: number;
      callTimeout?: number;
      logLevel?: string;
      pretty?: boolean;
    }) => {
      printBanner(version);
      try {
        // A single numeric id arrives as a number
        const devices =
          options.devices === undefined ? undefined : String(options.devices);
        const gateway = await runServe({ ...options, devices });
        installShutdownHandlers(gateway);
      } catch (err) {
        p.log.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
      }
    },
  );

// ── Start Command ──────────────────────────────────────────────

cli
  .command("start <deviceId> <idToken>", "Ask a device to start a transaction")
  .option("-e, --evse <id>", "EVSE to start on (default: 1)")
  .option("-t, --type <idTokenType>", "Id token type (default: ISO14443)")
  .option("--remote-start-id <id>", "remoteStartId to correlate with")
  .option("--timeout <ms>", "Give up waiting for the device after this long")
  .option("-u, --url <url>", "Bridge URL (default: http://127.0.0.1:9220)")
  .option("-w, --wait", "Wait for the device's answer")
  .example("  ocpp-bridge start CP1 TAG1 --evse 2 --wait")
  .action(
    async (
      deviceId: string,
      idToken: string,
      options: {
        evse?: number;
        type?: string;
        remoteStartId?: number;
        timeout?: number;
        url?: string;
        wait?: boolean;
      },
    ) => {
      await runStart(String(deviceId), String(idToken), options);
    },
  );

// ── Stop Command ───────────────────────────────────────────────

cli
  .command(
    "stop <deviceId> <transactionId>",
    "Ask a device to stop a transaction",
  )
  .option("--timeout <ms>", "Give up waiting for the device after this long")
  .option("-u, --url <url>", "Bridge URL (default: http://127.0.0.1:9220)")
  .option("-w, --wait", "Wait for the device's answer")
  .example("  ocpp-bridge stop CP1 TX-42 --wait")
  .action(
    async (
      deviceId: string,
      transactionId: string,
      options: { timeout?: number; url?: string; wait?: boolean },
    ) => {
      await runStop(String(deviceId), String(transactionId), options);
    },
  );

// ── Health Command ─────────────────────────────────────────────

cli
  .command("health", "Show sessions and pending calls of a running bridge")
  .option("-u, --url <url>", "Bridge URL (default: http://127.0.0.1:9220)")
  .action(async (options: { url?: string }) => {
    await runHealth(options);
  });

// ── Parse & Run ────────────────────────────────────────────────

cli.help();
cli.version(version);

cli.parse();
