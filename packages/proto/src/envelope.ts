import { z } from 'zod';
import { GatewayOpcode } from './opcodes';

/** Every gateway message, inbound or outbound, travels in this envelope. */
export const GatewayFrameSchema = z.object({
  op: z.number().int().min(0),
  d: z.unknown(),
  s: z.number().int().nullable().optional(),
  t: z.string().min(1).nullable().optional(),
});

export type GatewayFrame = z.infer<typeof GatewayFrameSchema>;

export interface DispatchFrame {
  op: typeof GatewayOpcode.DISPATCH;
  t: string;
  s: number | null;
  d: unknown;
}

export function createFrame(op: number, d: unknown = null): GatewayFrame {
  return { op, d };
}

export function encodeFrame(frame: GatewayFrame): string {
  return JSON.stringify({ op: frame.op, d: frame.d ?? null });
}

/** Returns null for anything that is not JSON or not shaped like a frame. */
export function decodeFrame(raw: string): GatewayFrame | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = GatewayFrameSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export function isDispatchFrame(frame: GatewayFrame): frame is GatewayFrame & DispatchFrame {
  return frame.op === GatewayOpcode.DISPATCH && typeof frame.t === 'string';
}
