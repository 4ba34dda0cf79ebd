/**
 * Redis client for BullMQ
 */

import { Redis } from "ioredis";
import { env } from "./env.js";

// Parse the Redis URL to extract connection details
const redisUrl = new URL(env.REDIS_URL);

export const redis = new Redis({
  host: redisUrl.hostname,
  port: parseInt(redisUrl.port || "6379", 10),
  password: redisUrl.password ? decodeURIComponent(redisUrl.password) : undefined,
  username: redisUrl.username ? decodeURIComponent(redisUrl.username) : undefined,
  db: redisUrl.pathname.length > 1 ? parseInt(redisUrl.pathname.slice(1), 10) || 0 : 0,

  // BullMQ requirements
  maxRetriesPerRequest: null,
  enableReadyCheck: false,

  connectTimeout: 60000,
  keepAlive: 30000,

  // TLS only for rediss:// URLs
  ...(redisUrl.protocol === "rediss:" ? { tls: { rejectUnauthorized: true } } : {}),

  // Retry strategy for connection issues
  retryStrategy: (times: number) => {
    if (times > 20) {
      console.error(`[redis] Failed to connect after ${times} attempts`);
      return null; // Stop retrying
    }
    const delay = Math.min(times * 500, 5000);
    console.log(`[redis] Retry attempt ${times}, waiting ${delay}ms`);
    return delay;
  },

  reconnectOnError: (err) => err.message.includes("READONLY"),
});

redis.on("error", (err) => {
  console.error("[redis] Connection error:", err.message);
});

redis.on("ready", () => {
  console.log("[redis] Ready to accept commands");
});
