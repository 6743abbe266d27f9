import type { AttributeCandidate } from '@app/types';

export type Dimensions = {
  width: number | null;
  depth: number | null;
  height: number | null;
  unit: string | null;
};

type Match = Readonly<{
  dimensions: Dimensions;
  evidence: string;
  score: number;
  sourceIndex: number;
  position: number;
}>;

const UNIT = 'cm|mm|inches|inch|in|feet|ft|m';

const AXIS_PATTERN = new RegExp(
  `(?<w>\\d+(?:\\.\\d+)?)\\s*(?<unitW>${UNIT})?\\s*(?:["”]?\\s*(?:width|w))?\\s*(?:x|×)\\s*` +
    `(?<d>\\d+(?:\\.\\d+)?)\\s*(?<unitD>${UNIT})?\\s*(?:["”]?\\s*(?:depth|d))?` +
    `(?:\\s*(?:x|×)\\s*(?<h>\\d+(?:\\.\\d+)?)\\s*(?<unitH>${UNIT})?\\s*(?:["”]?\\s*(?:height|h))?)?` +
    `\\s*(?<trailing>${UNIT})?`,
  'gi'
);

const LABEL_PATTERN = new RegExp(
  `\\b(?<label>width|depth|height|w|d|h)\\s*(?:[:=]\\s*)?(?<value>\\d+(?:\\.\\d+)?)(?:\\s*(?<unit>${UNIT}))?`,
  'gi'
);

function emptyDimensions(): Dimensions {
  return { width: null, depth: null, height: null, unit: null };
}

function parseNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function normalizeUnit(unit: string | undefined): string | null {
  if (!unit) return null;
  const lowered = unit.toLowerCase();
  if (lowered === 'inch' || lowered === 'inches') return 'in';
  if (lowered === 'feet' || lowered === 'foot') return 'ft';
  return lowered;
}

function inferUnit(text: string): string | null {
  if (text.includes('"') || text.includes('”')) return 'in';
  if (text.includes("'")) return 'ft';
  return null;
}

function axisCount(dimensions: Dimensions): number {
  return [dimensions.width, dimensions.depth, dimensions.height].filter((value) => value !== null)
    .length;
}

function score(dimensions: Dimensions): number {
  return axisCount(dimensions) * 10 + (dimensions.unit ? 1 : 0);
}

function findAxisMatches(text: string, sourceIndex: number): Match[] {
  const matches: Match[] = [];
  for (const match of text.matchAll(AXIS_PATTERN)) {
    const groups = match.groups ?? {};
    const width = parseNumber(groups['w']);
    const depth = parseNumber(groups['d']);
    const height = parseNumber(groups['h']);
    if (!width && !depth && !height) continue;

    const unit =
      normalizeUnit(groups['trailing']) ??
      normalizeUnit(groups['unitW']) ??
      normalizeUnit(groups['unitD']) ??
      normalizeUnit(groups['unitH']) ??
      inferUnit(match[0]);
    const dimensions = { width, depth, height, unit };
    matches.push({
      dimensions,
      evidence: match[0],
      score: score(dimensions),
      sourceIndex,
      position: match.index ?? 0,
    });
  }
  return matches;
}

/** Labelled values (`W: 30 D: 20`) grouped into runs; a repeated label starts a new run. */
function findLabelMatches(text: string, sourceIndex: number): Match[] {
  const matches: Match[] = [];
  let current = emptyDimensions();
  let start: number | null = null;
  let lastEnd: number | null = null;
  let seen: string[] = [];

  const flush = (end: number): void => {
    if (start !== null && axisCount(current) >= 2) {
      const dimensions = { ...current };
      matches.push({
        dimensions,
        evidence: text.slice(start, end),
        score: score(dimensions),
        sourceIndex,
        position: start,
      });
    }
    current = emptyDimensions();
    start = null;
    lastEnd = null;
    seen = [];
  };

  for (const match of text.matchAll(LABEL_PATTERN)) {
    const groups = match.groups ?? {};
    const label = (groups['label'] ?? '').toLowerCase().charAt(0);
    const value = parseNumber(groups['value']);
    const unit = normalizeUnit(groups['unit']);
    const index = match.index ?? 0;

    if (seen.includes(label)) flush(index);

    start ??= index;
    lastEnd = index + match[0].length;
    seen.push(label);

    if (value !== null) {
      if (label === 'w' && current.width === null) current.width = value;
      else if (label === 'd' && current.depth === null) current.depth = value;
      else if (label === 'h' && current.height === null) current.height = value;
      if (!current.unit && unit) current.unit = unit;
    }
  }

  if (lastEnd !== null) flush(lastEnd);
  return matches;
}

export function formatDimensions(dimensions: Dimensions): string {
  const axes = [dimensions.width, dimensions.depth, dimensions.height]
    .filter((value): value is number => value !== null)
    .map((value) => String(value))
    .join(' x ');
  return dimensions.unit ? `${axes} ${dimensions.unit}` : axes;
}

/** Best dimensions match across description then title, or null when nothing matched. */
export function parseDimensions(
  title: string,
  description: string
): { dimensions: Dimensions; evidence: string } | null {
  const sources = [description, title].filter((text) => text.length > 0);

  let best: Match | null = null;
  for (const [sourceIndex, text] of sources.entries()) {
    const matches = [...findAxisMatches(text, sourceIndex), ...findLabelMatches(text, sourceIndex)];
    for (const match of matches) {
      if (
        !best ||
        match.score > best.score ||
        (match.score === best.score && match.sourceIndex < best.sourceIndex) ||
        (match.score === best.score &&
          match.sourceIndex === best.sourceIndex &&
          match.position < best.position)
      ) {
        best = match;
      }
    }
  }

  if (!best) return null;
  return { dimensions: best.dimensions, evidence: best.evidence.trim() };
}

export function extractDimensions(title: string, description: string): AttributeCandidate | null {
  const parsed = parseDimensions(title, description);
  if (!parsed) return null;

  const count = axisCount(parsed.dimensions);
  return {
    attributeName: 'dimensions',
    value: formatDimensions(parsed.dimensions),
    confidence: count === 3 ? 0.95 : count === 2 ? 0.85 : 0.75,
    source: 'text',
    evidence: [parsed.evidence],
  };
}
