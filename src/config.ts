import dotenv from "dotenv";

dotenv.config();

// Defaults reproduce the stock entrypoint: wait for redis:6379, polling once a second.
export const config = {
  target: {
    host: process.env.GATE_HOST ?? "redis",
    port: parseInt(process.env.GATE_PORT ?? "6379", 10),
    /** Name used in the waiting/ready status lines */
    name: process.env.GATE_TARGET_NAME ?? "Redis",
  },
  service: {
    /** Name used in the start status line */
    name: process.env.GATE_SERVICE_NAME ?? "backend service",
  },
  poll: {
    intervalMs: parseInt(process.env.GATE_INTERVAL_MS ?? "1000", 10),
    /** Per-attempt connect timeout; the overall wait has none */
    connectTimeoutMs: parseInt(process.env.GATE_CONNECT_TIMEOUT_MS ?? "3000", 10),
  },
  logging: {
    level: process.env.LOG_LEVEL ?? "warn",
  },
};

export type GateConfig = typeof config;
