import { randomInt, randomUUID } from "crypto";
import type { ZodType, ZodTypeDef } from "zod";
import { ValidationError } from "../errors";

export * from "./geo";
export * from "./cache";

/**
 * Generate a unique ID
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Round to a fixed number of decimals (half away from zero)
 */
export function round(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.sign(value) * (Math.round(Math.abs(value) * factor) / factor);
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60_000);
}

export function minutesBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / 60_000;
}

const REFERENCE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

function randomString(length: number, alphabet: string): string {
  let result = "";
  for (let i = 0; i < length; i++) {
    result += alphabet[randomInt(alphabet.length)];
  }
  return result;
}

/**
 * Human-readable alert reference: EMG + yyyyMMddHHmm (UTC) + 6 random chars
 */
export function generateAlertReference(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const stamp =
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}`;
  return `EMG${stamp}${randomString(6, REFERENCE_ALPHABET)}`;
}

/**
 * 6-digit numeric verification code
 */
export function generateVerificationCode(): string {
  return randomString(6, "0123456789");
}

/**
 * Parse untrusted input with a zod schema, raising ValidationError on failure
 */
export function parseInput<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  input: unknown,
  message = "Invalid input"
): Output {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, result.error.flatten());
  }
  return result.data;
}
