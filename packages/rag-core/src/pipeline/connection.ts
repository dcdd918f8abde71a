/**
 * FILE PURPOSE: Shared Redis connection parsing for the indexing queue and worker
 */

export interface RedisConnectionOptions {
  host: string;
  port: number;
  username: string | undefined;
  password: string | undefined;
  db: number | undefined;
  tls: Record<string, never> | undefined;
}

export function parseRedisConnection(redisUrl?: string): RedisConnectionOptions {
  const url = redisUrl ?? process.env.REDIS_URL ?? 'redis://localhost:6379';
  const parsed = new URL(url);
  const db = parsed.pathname.replace(/^\//, '');

  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: /^\d+$/.test(db) ? parseInt(db, 10) : undefined,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
  };
}
