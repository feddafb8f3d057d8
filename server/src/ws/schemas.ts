import { z } from 'zod';
import { MAX_DEVICE_ID_BYTES } from '../lib/frameCodec.js';

const dimension = z.number().int().nonnegative().default(0);

export const ingestHandshakeSchema = z.object({
  device_id: z
    .string()
    .min(1)
    .refine((id) => Buffer.byteLength(id, 'utf8') <= MAX_DEVICE_ID_BYTES, {
      message: `device_id must fit in ${MAX_DEVICE_ID_BYTES} bytes`,
    }),
  room: z.string().optional(),
  width: dimension,
  height: dimension,
  fps: dimension,
});

export const connectQuerySchema = z.object({
  room: z.string().optional(),
  token: z.string().optional(),
});

/** Blank or missing rooms fall back to `fallback`; names are stored trimmed. */
export function resolveRoom(fallback: string, ...candidates: Array<string | undefined>): string {
  for (const candidate of candidates) {
    const room = candidate?.trim();
    if (room) return room;
  }
  return fallback;
}
