import { DEFAULT_TEMPLATE } from "./templates/evd";
import type { ArticleRecord, ClassifiedLine, KeyToken, PositionsdatenTemplate } from "./types";
import { classifyLine, isPackageKey, sectionHeaderPattern, splitLines } from "./utils";

type SegmentCursor = {
  lines: ClassifiedLine[];
  index: number;
};

function takeKeys(cursor: SegmentCursor): KeyToken[] {
  const keys: KeyToken[] = [];
  while (cursor.index < cursor.lines.length) {
    const line = cursor.lines[cursor.index];
    if (line.kind !== "key") break;
    keys.push(line.token);
    cursor.index += 1;
  }
  return keys;
}

function takeValues(cursor: SegmentCursor): string[] {
  const values: string[] = [];
  while (cursor.index < cursor.lines.length) {
    const line = cursor.lines[cursor.index];
    if (line.kind !== "value") break;
    values.push(line.text);
    cursor.index += 1;
  }
  return values;
}

/**
 * Rebuilds the labelled fields of one POSITIONSDATEN block.
 *
 * Extraction often emits a run of labels before the run of their values, so
 * keys and values are collected as groups and zipped. Values left over after a
 * key group are carried into the next one; whatever is still pending at the
 * end is reported as `unmapped`.
 */
export function parseSegment(
  segment: string,
  template: PositionsdatenTemplate = DEFAULT_TEMPLATE,
): ArticleRecord {
  const sectionHeader = sectionHeaderPattern(template);
  const lines = splitLines(segment).map((line) => classifyLine(line, template, sectionHeader));
  if (lines[0]?.kind === "section-header") lines.shift();

  const cursor: SegmentCursor = { lines, index: 0 };
  const main = new Map<string, string>();
  const packages = new Map<string, string>();
  let pendingValues: string[] = [];

  while (cursor.index < lines.length) {
    const current = lines[cursor.index];
    // Structural markers only; the PACKSTÜCKE routing is decided per key code.
    if (current.kind === "section-header" || current.kind === "sub-section-header") {
      cursor.index += 1;
      continue;
    }

    const keyGroup = takeKeys(cursor);
    const valueGroup = takeValues(cursor);

    if (!keyGroup.length) {
      pendingValues = pendingValues.concat(valueGroup);
      continue;
    }

    const available = [...pendingValues, ...valueGroup];
    keyGroup.forEach((token, idx) => {
      const bucket = isPackageKey(token.code, template) ? packages : main;
      bucket.set(token.label, available[idx] ?? "");
    });
    pendingValues = available.slice(keyGroup.length);
  }

  const record: ArticleRecord = { main };
  if (packages.size > 0) record.packages = packages;
  if (pendingValues.length > 0) record.unmapped = pendingValues;
  return record;
}
