import type { CallHandler } from "./types.js";

export const heartbeat: CallHandler = async (ctx) => {
  const currentTime = ctx.now().toISOString();
  await ctx.shadow.merge(ctx.deviceId, { lastHeartbeatAt: currentTime });
  return { ok: true, payload: { currentTime } };
};
