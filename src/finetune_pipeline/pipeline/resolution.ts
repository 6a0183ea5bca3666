import type { ResolutionSpec } from "./contracts";

export type ResolutionParseResult =
  | { ok: true; spec: ResolutionSpec }
  | { ok: false; error: string };

const COMPONENT_PATTERN = /^[0-9]+$/;

/**
 * Parses a `WxHxF` string (width, height, frame count). Each component must be a
 * positive base-10 integer and there must be exactly three of them.
 */
export function parseResolutionSpec(value: string): ResolutionParseResult {
  const parts = value.split("x");
  if (parts.length !== 3) {
    return {
      ok: false,
      error: `Expected WxHxF with 3 components, got ${parts.length} in "${value}".`,
    };
  }

  const numbers: number[] = [];
  for (const part of parts) {
    if (!COMPONENT_PATTERN.test(part)) {
      return { ok: false, error: `Component "${part}" in "${value}" is not an integer.` };
    }
    const parsed = Number(part);
    if (!Number.isSafeInteger(parsed) || parsed <= 0) {
      return { ok: false, error: `Component "${part}" in "${value}" must be a positive integer.` };
    }
    numbers.push(parsed);
  }

  const [width, height, frames] = numbers;
  return { ok: true, spec: { width, height, frames } };
}

export function toVideoDims(spec: ResolutionSpec): [number, number, number] {
  return [spec.width, spec.height, spec.frames];
}
