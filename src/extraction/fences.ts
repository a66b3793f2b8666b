export interface FencedRegion {
  language?: string;
  /** Target name from a `file:` / `filename:` line, verbatim */
  directive?: string;
  /** Trimmed body without the directive line */
  content: string;
}

const OPENING_FENCE = /^\s*(`{3,})(.*)$/;
const CLOSING_FENCE = /^\s*(`{3,})\s*$/;
const LANGUAGE_TAG = /^[\w+#.-]+$/;
const DIRECTIVE = /^\s*(?:#|\/\/|--|;|<!--|\/\*)?\s*(?:file|filename)\s*:\s*(\S+)/i;

/** Parse a filename directive from a single line */
export function parseDirective(line: string): string | undefined {
  const match = DIRECTIVE.exec(line);
  if (!match?.[1]) return undefined;
  const name = match[1].replace(/^[`'"]+|[`'"]+$/g, '').replace(/(?:-->|\*\/)$/, '');
  return name || undefined;
}

/**
 * Scan markdown-style fenced regions in order. A closing fence needs at least
 * as many backticks as its opening; a fence still open at the end of the
 * text runs to the end.
 */
export function scanFencedRegions(text: string): FencedRegion[] {
  const lines = text.split(/\r?\n/);
  const regions: FencedRegion[] = [];
  let i = 0;

  while (i < lines.length) {
    const opening = OPENING_FENCE.exec(lines[i] ?? '');
    if (!opening) {
      i++;
      continue;
    }

    const fenceLength = opening[1]?.length ?? 3;
    const { language, directive: infoDirective } = parseInfo(opening[2] ?? '');
    const body: string[] = [];
    i++;

    while (i < lines.length) {
      const line = lines[i] ?? '';
      const closing = CLOSING_FENCE.exec(line);
      if (closing && (closing[1]?.length ?? 0) >= fenceLength) break;
      body.push(line);
      i++;
    }
    // skip the closing fence
    i++;

    let directive = infoDirective;
    if (!directive) {
      const first = body.findIndex((line) => line.trim() !== '');
      const candidate = first >= 0 ? parseDirective(body[first] ?? '') : undefined;
      if (candidate) {
        directive = candidate;
        body.splice(first, 1);
      }
    }

    regions.push({ language, directive, content: body.join('\n').trim() });
  }

  return regions;
}

function parseInfo(info: string): { language?: string; directive?: string } {
  const trimmed = info.trim();
  if (!trimmed) return {};

  // info string that is only a directive, e.g. ```# File: app.py
  const directive = parseDirective(trimmed);
  if (directive) return { directive };

  const [first = '', ...rest] = trimmed.split(/\s+/);
  const language = LANGUAGE_TAG.test(first) ? first : undefined;
  return { language, directive: parseDirective(rest.join(' ')) };
}
