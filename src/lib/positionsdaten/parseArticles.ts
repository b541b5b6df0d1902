import { StructureNotFoundError } from "./errors";
import { parseSegment } from "./parseSegment";
import { splitIntoSegments } from "./segmenter";
import { DEFAULT_TEMPLATE } from "./templates/evd";
import type { ArticleRecord, PositionsdatenTemplate } from "./types";

export function parseArticles(
  rawText: string,
  template: PositionsdatenTemplate = DEFAULT_TEMPLATE,
): ArticleRecord[] {
  const segments = splitIntoSegments(rawText, template);
  if (!segments.length) {
    throw new StructureNotFoundError(template.name);
  }
  return segments.map((segment) => parseSegment(segment, template));
}
