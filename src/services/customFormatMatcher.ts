import logger from '../config/logger';
import type { CustomFormat, Specification } from '../models/CustomFormat';
import type { ParsedQuality } from './qualityParser';

export interface FormatMatchInput {
  title: string;
  size: number;
  quality: ParsedQuality;
}

const BYTES_PER_GB = 1024 * 1024 * 1024;

// Compiled pattern per source string; null marks an invalid pattern
const patternCache = new Map<string, RegExp | null>();

function compile(pattern: string): RegExp | null {
  const cached = patternCache.get(pattern);
  if (cached !== undefined) return cached;

  let compiled: RegExp | null;
  try {
    compiled = new RegExp(pattern, 'i');
  } catch (error) {
    logger.warn(`[CustomFormat] Invalid pattern "${pattern}", it will never match`, error);
    compiled = null;
  }
  patternCache.set(pattern, compiled);
  return compiled;
}

function equalsIgnoreCase(a: string | null, b: string): boolean {
  return a !== null && a.toLowerCase() === b.toLowerCase();
}

function matchesSpecification(spec: Specification, input: FormatMatchInput): boolean {
  switch (spec.implementation) {
    case 'ReleaseTitleSpecification':
      return compile(spec.pattern)?.test(input.title) ?? false;
    case 'ReleaseGroupSpecification': {
      const group = input.quality.releaseGroup;
      return group !== null && (compile(spec.pattern)?.test(group) ?? false);
    }
    case 'SourceSpecification':
      return equalsIgnoreCase(input.quality.source, spec.value);
    case 'ResolutionSpecification':
      return equalsIgnoreCase(input.quality.resolution, spec.value);
    case 'SizeSpecification': {
      if (input.size <= 0) return false;
      const sizeGb = input.size / BYTES_PER_GB;
      return (spec.min === undefined || sizeGb >= spec.min) && (spec.max === undefined || sizeGb <= spec.max);
    }
  }
}

/**
 * Every specification must hold, after its own negation. A format with no
 * specifications never matches.
 */
export function matchesFormat(format: CustomFormat, input: FormatMatchInput): boolean {
  if (format.specifications.length === 0) {
    return false;
  }
  return format.specifications.every(spec => matchesSpecification(spec, input) !== spec.negate);
}

export function matchFormats(formats: CustomFormat[], input: FormatMatchInput): CustomFormat[] {
  return formats.filter(format => matchesFormat(format, input));
}
