import type { CallHandler } from "./types.js";

/** Stores the boot payload and accepts the device. */
export const bootNotification: CallHandler = async (ctx) => {
  const now = ctx.now().toISOString();
  await ctx.shadow.merge(ctx.deviceId, {
    boot: ctx.payload,
    lastBootAt: now,
  });
  ctx.logger?.info?.("Device booted", { deviceId: ctx.deviceId });

  return {
    ok: true,
    payload: {
      currentTime: now,
      interval: ctx.heartbeatInterval,
      status: "Accepted",
    },
  };
};
