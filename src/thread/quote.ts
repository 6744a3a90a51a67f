import { extname } from 'node:path';
import { ConfigurationError } from './errors.js';

/**
 * Region quoting: text selected elsewhere is passed through an ordered list
 * of filters before it opens a new thread.
 */
export type SourceKind = 'prose' | 'programming' | 'markup';

export interface SourceContext {
  /** Short mode name used to tag source blocks (`python`, `typescript`, ...). */
  mode: string;
  kind: SourceKind;
}

export type RegionFilter = (text: string, source: SourceContext) => string;

export const PLAIN_TEXT_SOURCE: SourceContext = { mode: 'text', kind: 'prose' };

export const ensureTrailingNewline: RegionFilter = (text) =>
  text.endsWith('\n') ? text : `${text}\n`;

/**
 * Wrap code and markup in a `#+begin_src <mode>` block. Expects the text to
 * end with a newline so the closing line stands alone.
 */
export const encloseInCodeBlock: RegionFilter = (text, source) => {
  if (source.kind === 'prose') return text;
  return `#+begin_src ${source.mode}\n${text}#+end_src\n`;
};

export const REGION_FILTERS = {
  'ensure-trailing-newline': ensureTrailingNewline,
  'enclose-in-code-block': encloseInCodeBlock,
} satisfies Record<string, RegionFilter>;

export type RegionFilterName = keyof typeof REGION_FILTERS;

export const DEFAULT_REGION_FILTERS: RegionFilterName[] = [
  'ensure-trailing-newline',
  'enclose-in-code-block',
];

export function isRegionFilterName(name: string): name is RegionFilterName {
  return Object.prototype.hasOwnProperty.call(REGION_FILTERS, name);
}

/**
 * Resolve configured filter names, in order.
 */
export function resolveRegionFilters(names: readonly string[]): RegionFilter[] {
  return names.map((name) => {
    if (!isRegionFilterName(name)) {
      throw new ConfigurationError(`Unknown region filter: ${JSON.stringify(name)}`);
    }
    return REGION_FILTERS[name];
  });
}

/**
 * Apply `filters` left to right.
 */
export function quoteRegion(
  text: string,
  source: SourceContext,
  filters: readonly RegionFilter[] = resolveRegionFilters(DEFAULT_REGION_FILTERS)
): string {
  return filters.reduce((current, filter) => filter(current, source), text);
}

const MODES_BY_EXTENSION: Record<string, SourceContext> = {
  '.c': { mode: 'c', kind: 'programming' },
  '.cpp': { mode: 'cpp', kind: 'programming' },
  '.css': { mode: 'css', kind: 'programming' },
  '.go': { mode: 'go', kind: 'programming' },
  '.html': { mode: 'html', kind: 'markup' },
  '.java': { mode: 'java', kind: 'programming' },
  '.js': { mode: 'js', kind: 'programming' },
  '.json': { mode: 'json', kind: 'programming' },
  '.md': { mode: 'markdown', kind: 'markup' },
  '.py': { mode: 'python', kind: 'programming' },
  '.rb': { mode: 'ruby', kind: 'programming' },
  '.rs': { mode: 'rust', kind: 'programming' },
  '.sh': { mode: 'sh', kind: 'programming' },
  '.sql': { mode: 'sql', kind: 'programming' },
  '.ts': { mode: 'typescript', kind: 'programming' },
  '.tsx': { mode: 'tsx', kind: 'programming' },
  '.xml': { mode: 'xml', kind: 'markup' },
  '.yaml': { mode: 'yaml', kind: 'programming' },
  '.yml': { mode: 'yaml', kind: 'programming' },
  '.txt': PLAIN_TEXT_SOURCE,
  '.org': { mode: 'org', kind: 'prose' },
};

/**
 * Work out the source context from an explicit mode or a file name.
 *
 * An explicit mode found in the table keeps its kind; an unknown mode is
 * treated as code. Without either, the text is prose.
 */
export function resolveSourceContext(options: { mode?: string; fileName?: string }): SourceContext {
  if (options.mode) {
    const known = Object.values(MODES_BY_EXTENSION).find((ctx) => ctx.mode === options.mode);
    return known ?? { mode: options.mode, kind: 'programming' };
  }
  if (options.fileName) {
    const known = MODES_BY_EXTENSION[extname(options.fileName).toLowerCase()];
    if (known) return known;
  }
  return PLAIN_TEXT_SOURCE;
}
