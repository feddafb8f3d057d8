import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv({
  path: path.resolve(process.cwd(), '.env'),
});

const urlPath = z
  .string()
  .regex(/^\/[\w\-/]*$/, 'must be an absolute URL path');

const envSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().positive().default(6699),
    HOST: z.string().min(1).default('0.0.0.0'),
    INGEST_PATH: urlPath.default('/ingest'),
    VIEWER_PATH: urlPath.default('/view'),
    DEFAULT_ROOM: z.string().trim().min(1).default('home'),
    WS_HEARTBEAT_MS: z.coerce.number().int().positive().default(30_000),
    WS_PONG_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    WS_SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    FRAME_SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(500),
    MAX_FRAME_QUEUE: z.coerce.number().int().min(1).default(2),
    MAX_FRAME_BYTES: z.coerce.number().int().positive().default(1 << 20),
    MAX_VIEWER_MESSAGE_BYTES: z.coerce.number().int().positive().default(1 << 10),
    CORS_ORIGINS: z.string().default('*'),
    TLS_CERT_PATH: z.string().min(1).optional(),
    TLS_KEY_PATH: z.string().min(1).optional(),
    LOG_LEVEL: z.string().default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.WS_PONG_TIMEOUT_MS <= env.WS_HEARTBEAT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['WS_PONG_TIMEOUT_MS'],
        message: 'WS_PONG_TIMEOUT_MS must be greater than WS_HEARTBEAT_MS',
      });
    }
    if (Boolean(env.TLS_CERT_PATH) !== Boolean(env.TLS_KEY_PATH)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TLS_CERT_PATH'],
        message: 'TLS_CERT_PATH and TLS_KEY_PATH must be set together',
      });
    }
  });

const parsed = envSchema.parse(process.env);

function parseOrigins(raw: string): string[] | true {
  const origins = raw
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return origins.length === 0 || origins.includes('*') ? true : origins;
}

export const config = {
  nodeEnv: parsed.NODE_ENV,
  port: parsed.PORT,
  host: parsed.HOST,
  ingestPath: parsed.INGEST_PATH,
  viewerPath: parsed.VIEWER_PATH,
  defaultRoom: parsed.DEFAULT_ROOM,
  heartbeatMs: parsed.WS_HEARTBEAT_MS,
  pongTimeoutMs: parsed.WS_PONG_TIMEOUT_MS,
  sendTimeoutMs: parsed.WS_SEND_TIMEOUT_MS,
  frameSendTimeoutMs: parsed.FRAME_SEND_TIMEOUT_MS,
  maxFrameQueue: parsed.MAX_FRAME_QUEUE,
  maxFrameBytes: parsed.MAX_FRAME_BYTES,
  maxViewerMessageBytes: parsed.MAX_VIEWER_MESSAGE_BYTES,
  corsOrigins: parseOrigins(parsed.CORS_ORIGINS),
  tls:
    parsed.TLS_CERT_PATH && parsed.TLS_KEY_PATH
      ? { certPath: parsed.TLS_CERT_PATH, keyPath: parsed.TLS_KEY_PATH }
      : undefined,
  logLevel: parsed.LOG_LEVEL,
};
