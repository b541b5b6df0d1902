import { DEFAULT_TEMPLATE } from "./templates/evd";
import type { PositionsdatenTemplate } from "./types";
import { sectionHeaderPattern } from "./utils";

export function findSectionStarts(
  rawText: string,
  template: PositionsdatenTemplate = DEFAULT_TEMPLATE,
): number[] {
  const pattern = sectionHeaderPattern(template, "gm");
  const starts: number[] = [];
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(rawText)) !== null) {
    starts.push(match.index);
    if (match[0].length === 0) pattern.lastIndex += 1;
  }
  return starts;
}

export function splitIntoSegments(
  rawText: string,
  template: PositionsdatenTemplate = DEFAULT_TEMPLATE,
): string[] {
  const starts = findSectionStarts(rawText, template);
  return starts.map((start, idx) => rawText.slice(start, starts[idx + 1] ?? rawText.length));
}
