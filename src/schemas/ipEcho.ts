import { z } from 'zod';

export const IPV4_PATTERN = /^(\d{1,3}\.){3}\d{1,3}$/;
export const IPV6_PATTERN = /^([0-9a-fA-F]{0,4}:){7}[0-9a-fA-F]{0,4}$/;

export const ipJsonSchema = z.object({
  ip: z.string().min(1),
});

export type IpJson = z.infer<typeof ipJsonSchema>;

export function isIpAddress(value: string): boolean {
  return IPV4_PATTERN.test(value) || IPV6_PATTERN.test(value);
}
