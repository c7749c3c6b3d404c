/**
 * ExclusionFilter: text regions where a trigger word never counts.
 *
 * - QUOTE    quoted or cited text, up to 200 characters between the marks
 * - URL      links and bare domains
 * - COMMAND  a registered bot command at the start of the message, with its arguments
 */

export type ExclusionReason = 'QUOTE' | 'URL' | 'COMMAND';

export interface ExcludedSpan {
  start: number;
  end: number;
  reason: ExclusionReason;
}

const QUOTE_PATTERNS: RegExp[] = [
  /"[^"]{1,200}"/gu,
  /“[^”]{1,200}”/gu,
  /„[^“”]{1,200}[“”]/gu,
  /«[^»]{1,200}»/gu,
  /‘[^’]{1,200}’/gu,
  // Apostrophes inside words (don't, it's) are not quote marks
  /(?<![\p{L}\p{N}])'[^']{1,200}'(?![\p{L}\p{N}])/gu,
];

const TLDS = [
  'com', 'net', 'org', 'info', 'io', 'dev', 'app', 'me', 'co', 'gg', 'tv', 'xyz',
  'ru', 'su', 'рф', 'ua', 'by', 'kz', 'de', 'uk', 'fr', 'cn', 'jp', 'eu',
];

const URL_PATTERNS: RegExp[] = [
  /[a-z][a-z0-9+.-]*:\/\/\S+/giu,
  /(?<![\p{L}\p{N}])www\.\S+/giu,
  new RegExp(
    `(?<![\\p{L}\\p{N}@./\\-])(?:[\\p{L}\\p{N}\\-]+\\.)+(?:${TLDS.join('|')})(?![\\p{L}\\p{N}])(?:[/?#]\\S*)?`,
    'giu',
  ),
];

const COMMAND_HEAD = /^\s*[/!！]\s*(\S+)/u;

function collect(text: string, pattern: RegExp, reason: ExclusionReason, into: ExcludedSpan[]): void {
  for (const match of text.matchAll(pattern)) {
    if (match.index === undefined) continue;
    into.push({ start: match.index, end: match.index + match[0].length, reason });
  }
}

export interface ExclusionFilterOptions {
  /** Command names and aliases; other `/word` prefixes are ordinary text */
  commandNames?: Iterable<string>;
}

export class ExclusionFilter {
  private readonly commandNames: ReadonlySet<string>;

  constructor(options: ExclusionFilterOptions = {}) {
    this.commandNames = new Set([...(options.commandNames ?? [])].map((name) => name.toLowerCase()));
  }

  /**
   * Excluded spans sorted by start (longer first on ties). Spans may overlap.
   */
  spans(text: string): ExcludedSpan[] {
    const spans: ExcludedSpan[] = [];
    if (text.length === 0) return spans;

    if (this.isCommand(text)) spans.push({ start: 0, end: text.length, reason: 'COMMAND' });

    for (const pattern of QUOTE_PATTERNS) collect(text, pattern, 'QUOTE', spans);
    for (const pattern of URL_PATTERNS) collect(text, pattern, 'URL', spans);

    return spans.sort((a, b) => a.start - b.start || b.end - a.end);
  }

  private isCommand(text: string): boolean {
    const head = COMMAND_HEAD.exec(text)?.[1];
    return head !== undefined && this.commandNames.has(head.toLowerCase());
  }
}

/** The first span that fully contains [start, end), if any */
export function containingSpan(
  spans: readonly ExcludedSpan[],
  start: number,
  end: number,
): ExcludedSpan | undefined {
  return spans.find((span) => span.start <= start && end <= span.end);
}
