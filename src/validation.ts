import { z } from 'zod';
import { HttpError } from './httpError.js';

export const deviceIdSchema = z
  .string()
  .regex(/^\d{1,3}-\d{1,3}$/, 'deviceId must look like <bus>-<address>');

export const descriptorParseRequestSchema = z
  .object({
    // 64 KiB of descriptor bytes, written as hex with separators
    hex: z.string().min(1).max(256 * 1024),
  })
  .strict();

const flagSchema = z.enum(['true', 'false', '1', '0']);

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

export function parseDeviceId(raw: unknown): string {
  const parsed = deviceIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new HttpError(400, describeIssues(parsed.error));
  }
  return parsed.data;
}

export function parseDescriptorRequest(body: unknown): z.infer<typeof descriptorParseRequestSchema> {
  const parsed = descriptorParseRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new HttpError(400, `invalid request body: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseFlag(raw: unknown, name: string): boolean | undefined {
  if (raw === undefined) return undefined;
  const parsed = flagSchema.safeParse(raw);
  if (!parsed.success) {
    throw new HttpError(400, `${name} must be true or false`);
  }
  return parsed.data === 'true' || parsed.data === '1';
}
