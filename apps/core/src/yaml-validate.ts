import { ConfigError } from "./errors.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface Validators {
  fail(message: string): never;
  requireRecord(raw: unknown, context: string): Record<string, unknown>;
  requireString(obj: Record<string, unknown>, key: string, context: string): string;
  requirePositiveInt(obj: Record<string, unknown>, key: string, context: string): number;
  optionalPositiveInt(obj: Record<string, unknown>, key: string, context: string, fallback: number): number;
  optionalNonNegativeInt(obj: Record<string, unknown>, key: string, context: string, fallback: number): number;
  optionalString(obj: Record<string, unknown>, key: string): string | undefined;
  optionalBoolean(obj: Record<string, unknown>, key: string, context: string, fallback: boolean): boolean;
  requireStringList(obj: Record<string, unknown>, key: string, context: string): string[];
  optionalStringList(obj: Record<string, unknown>, key: string, context: string): string[];
}

/** Build the validators for one YAML document; every failure names the document. */
export function validatorsFor(document: string): Validators {
  function fail(message: string): never {
    throw new ConfigError(`${document} error: ${message}`);
  }

  function requireRecord(raw: unknown, context: string): Record<string, unknown> {
    if (!isRecord(raw)) fail(`${context} must be an object`);
    return raw;
  }

  function requireString(obj: Record<string, unknown>, key: string, context: string): string {
    const val = obj[key];
    if (typeof val !== "string" || val === "") {
      fail(`"${key}" must be a non-empty string in ${context}`);
    }
    return val;
  }

  function requirePositiveInt(obj: Record<string, unknown>, key: string, context: string): number {
    const val = obj[key];
    if (typeof val !== "number" || !Number.isInteger(val) || val <= 0) {
      fail(`"${key}" must be a positive integer in ${context}`);
    }
    return val;
  }

  function optionalPositiveInt(obj: Record<string, unknown>, key: string, context: string, fallback: number): number {
    if (obj[key] === undefined || obj[key] === null) return fallback;
    return requirePositiveInt(obj, key, context);
  }

  function optionalNonNegativeInt(obj: Record<string, unknown>, key: string, context: string, fallback: number): number {
    const val = obj[key];
    if (val === undefined || val === null) return fallback;
    if (typeof val !== "number" || !Number.isInteger(val) || val < 0) {
      fail(`"${key}" must be a non-negative integer in ${context}`);
    }
    return val;
  }

  function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
    const val = obj[key];
    if (val === undefined || val === null) return undefined;
    if (typeof val !== "string") fail(`"${key}" must be a string if provided`);
    return val;
  }

  function optionalBoolean(obj: Record<string, unknown>, key: string, context: string, fallback: boolean): boolean {
    const val = obj[key];
    if (val === undefined || val === null) return fallback;
    if (typeof val !== "boolean") fail(`"${key}" must be a boolean in ${context}`);
    return val;
  }

  function requireStringList(obj: Record<string, unknown>, key: string, context: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val) || val.length === 0) fail(`"${key}" must be a non-empty list in ${context}`);
    return val.map((item, i) => {
      if (typeof item !== "string" || item === "") fail(`"${key}[${i}]" must be a non-empty string in ${context}`);
      return item;
    });
  }

  function optionalStringList(obj: Record<string, unknown>, key: string, context: string): string[] {
    const val = obj[key];
    if (val === undefined || val === null || (Array.isArray(val) && val.length === 0)) return [];
    return requireStringList(obj, key, context);
  }

  return {
    fail,
    requireRecord,
    requireString,
    requirePositiveInt,
    optionalPositiveInt,
    optionalNonNegativeInt,
    optionalString,
    optionalBoolean,
    requireStringList,
    optionalStringList,
  };
}
