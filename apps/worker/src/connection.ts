import type { ConnectionOptions } from "bullmq";

export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    password: parsed.password || undefined,
    // BullMQ workers need blocking commands to wait indefinitely
    maxRetriesPerRequest: null,
  };
}
