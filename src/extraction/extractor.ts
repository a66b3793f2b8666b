import { scanFencedRegions } from './fences';
import { DETECTION_RULES, detectFilename } from './rules';
import type { DetectionRule } from './rules';
import { DEFAULT_LANGUAGE, PositionalNamer } from './languages';

export interface ExtractedFile {
  filename: string;
  content: string;
}

export interface ExtractOptions {
  /** Language assumed for untagged regions (default: python) */
  defaultLanguage?: string;
  rules?: readonly DetectionRule[];
}

interface CodeIndicator {
  pattern: RegExp;
  language: (text: string) => string | undefined;
}

// Checked only when the text has no fenced regions at all
const CODE_INDICATORS: readonly CodeIndicator[] = [
  { pattern: /^#!\//, language: (text) => (/^#!.*python/.test(text) ? 'python' : 'bash') },
  { pattern: /<!DOCTYPE\s+html/i, language: () => 'html' },
  { pattern: /<\?php/, language: () => 'php' },
  { pattern: /\bdef\s+\w+\s*\(/, language: () => undefined },
  { pattern: /\bclass\s+\w+\s*[:(]/, language: () => undefined },
  { pattern: /^\s*import\s+[\w.]+/m, language: () => undefined },
  { pattern: /^\s*from\s+[\w.]+\s+import\s+/m, language: () => undefined },
  { pattern: /^\s*(?:function\s+\w+\s*\(|const\s+\w+\s*=|let\s+\w+\s*=|var\s+\w+\s*=)/m, language: () => 'javascript' },
];

/**
 * Turn generated text into an ordered filename → content map.
 *
 * Name precedence per region: explicit directive, then the first matching
 * detection rule, then a positional default from the language tag. A name
 * seen twice keeps its first position and the later content.
 */
export function extractFiles(text: string, options: ExtractOptions = {}): Map<string, string> {
  const defaultLanguage = options.defaultLanguage ?? DEFAULT_LANGUAGE;
  const rules = options.rules ?? DETECTION_RULES;
  const namer = new PositionalNamer(defaultLanguage);
  const files = new Map<string, string>();

  const regions = scanFencedRegions(text);
  if (regions.length === 0) {
    return extractWholeText(text, namer);
  }

  for (const region of regions) {
    if (!region.content) continue;
    const filename = region.directive ?? detectFilename(region.content, region.language, rules) ?? namer.next(region.language);
    files.set(filename, region.content);
  }

  return files;
}

function extractWholeText(text: string, namer: PositionalNamer): Map<string, string> {
  const files = new Map<string, string>();
  const content = text.trim();
  if (!content) return files;

  const indicator = CODE_INDICATORS.find((i) => i.pattern.test(content));
  if (!indicator) return files;

  files.set(namer.next(indicator.language(content)), content);
  return files;
}

export function toExtractedFiles(files: ReadonlyMap<string, string>): ExtractedFile[] {
  return [...files.entries()].map(([filename, content]) => ({ filename, content }));
}

/** Whether a filename follows a common test-file convention */
export function isTestFilename(filename: string): boolean {
  const base = filename.split(/[\\/]/).pop() ?? filename;
  return /^test_.+\.py$/.test(base) || /_test\.py$/.test(base) || /\.(?:test|spec)\.[cm]?[jt]sx?$/.test(base);
}
