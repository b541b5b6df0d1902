import { extractPdfText } from "../pdf/extractText";
import { flattenArticles } from "./flatten";
import { parseArticles } from "./parseArticles";
import { DEFAULT_TEMPLATE, VERSION } from "./templates/evd";
import type {
  ArticleRecord,
  CollisionRule,
  KeyAlias,
  PositionsdatenParserMeta,
  PositionsdatenResult,
  PositionsdatenTemplate,
} from "./types";
import { applyKeyAliases, mergeWarnings } from "./utils";

export type ParsePositionsdatenOptions = {
  template?: PositionsdatenTemplate;
  keyAliases?: KeyAlias[];
  collision?: CollisionRule;
};

export type ParsePositionsdatenPdfOptions = ParsePositionsdatenOptions & {
  data: Uint8Array;
};

const MIN_TEXT_LENGTH = 20;

function unmappedWarnings(articles: ArticleRecord[]): string[] {
  return articles.flatMap((article, idx) => {
    const count = article.unmapped?.length ?? 0;
    return count > 0 ? [`Position ${idx + 1}: ${count} Wert(e) ohne Feld verworfen`] : [];
  });
}

function buildResult(
  text: string,
  options: ParsePositionsdatenOptions,
  source: PositionsdatenParserMeta["source"],
  extractionWarnings: string[],
): PositionsdatenResult {
  const template = options.template ?? DEFAULT_TEMPLATE;
  const prepared = applyKeyAliases(text, options.keyAliases);
  const articles = parseArticles(prepared, template);

  const dropped = unmappedWarnings(articles);
  if (dropped.length) {
    console.warn("Positionsdaten enthalten nicht zugeordnete Werte", dropped);
  }

  return {
    articles,
    table: flattenArticles(articles, { collision: options.collision }),
    warnings: mergeWarnings(extractionWarnings, dropped),
    parser: {
      template: template.name,
      version: VERSION,
      source,
    },
  };
}

export function parsePositionsdatenText(
  text: string,
  options: ParsePositionsdatenOptions = {},
): PositionsdatenResult {
  return buildResult(text, options, "text", []);
}

export async function parsePositionsdatenPdf(
  options: ParsePositionsdatenPdfOptions,
): Promise<PositionsdatenResult> {
  const { data, ...parseOptions } = options;
  const { text } = await extractPdfText(data);
  const extractionWarnings: string[] = [];

  if (text.replace(/\s+/g, "").length < MIN_TEXT_LENGTH) {
    console.warn("PDF enthält keinen lesbaren Text");
    extractionWarnings.push("PDF enthält keinen lesbaren Text");
  }

  return buildResult(text, parseOptions, "pdf", extractionWarnings);
}
