import pino from "pino";

function buildTransport() {
  if (process.env.LOG_LEVEL === "silent") return undefined;

  const targets: pino.TransportTargetOptions[] = [];

  if (process.env.NODE_ENV !== "production") {
    targets.push({ target: "pino/file", options: { destination: 1 } });
  }
  if (process.env.LOG_FILE) {
    targets.push({
      target: "pino/file",
      level: "debug",
      options: { destination: process.env.LOG_FILE, mkdir: true },
    });
  }

  return targets.length > 0 ? { targets } : undefined;
}

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  transport: buildTransport(),
});

export function createChildLogger(context: Record<string, unknown>) {
  return logger.child(context);
}
