import { createRequire } from "node:module";
import { dirname, join } from "node:path";
import { pathToFileURL } from "node:url";
import type { TextContent, TextItem } from "pdfjs-dist/types/src/display/api";

type PdfJsModule = typeof import("pdfjs-dist/legacy/build/pdf.mjs");

const nodeRequire = createRequire(import.meta.url);

// pdfjs reads the fonts from disk under Node; the directory needs a trailing separator.
const STANDARD_FONT_DATA_DIR = `${join(dirname(nodeRequire.resolve("pdfjs-dist/package.json")), "standard_fonts")}/`;

let pdfJsModulePromise: Promise<PdfJsModule> | null = null;

// The legacy build runs on Node 20; the worker runs in-process from its module URL.
function loadPdfJs(): Promise<PdfJsModule> {
  if (!pdfJsModulePromise) {
    pdfJsModulePromise = import("pdfjs-dist/legacy/build/pdf.mjs").then((pdfjs) => {
      if (!pdfjs.GlobalWorkerOptions.workerSrc) {
        pdfjs.GlobalWorkerOptions.workerSrc = pathToFileURL(
          nodeRequire.resolve("pdfjs-dist/legacy/build/pdf.worker.mjs"),
        ).href;
      }
      return pdfjs;
    });
  }
  return pdfJsModulePromise;
}

export type ExtractedPdfText = {
  text: string;
  pageTexts: string[];
};

// Table cells arrive as separate items; a large jump on the x axis starts a new cell line.
const CELL_GAP = 20;

export function joinTextItems(items: TextContent["items"]): string {
  const parts: string[] = [];
  let lastX: number | null = null;
  let lastWidth: number | null = null;

  for (const item of items) {
    if (!("str" in item)) continue;
    const textItem: TextItem = item;
    const text = textItem.str;
    if (!text) {
      if (textItem.hasEOL && parts.length > 0 && parts[parts.length - 1] !== "\n") {
        parts.push("\n");
        lastX = null;
        lastWidth = null;
      }
      continue;
    }

    const rawX: unknown = textItem.transform[4];
    const currentX = typeof rawX === "number" ? rawX : null;
    const currentWidth = Number.isFinite(textItem.width) ? textItem.width : null;

    const startsNewCell =
      lastX !== null &&
      currentX !== null &&
      Math.abs(currentX - lastX) > CELL_GAP &&
      (currentX < lastX || (lastWidth !== null && currentX - lastX > lastWidth * 1.5));

    const previousPart = parts[parts.length - 1];
    const needsWhitespace =
      parts.length > 0 &&
      previousPart !== "\n" &&
      !previousPart?.endsWith(" ") &&
      !text.startsWith(" ");

    if (startsNewCell && previousPart !== "\n") {
      parts.push("\n");
    } else if (needsWhitespace) {
      parts.push(" ");
    }

    parts.push(text);

    if (textItem.hasEOL) {
      parts.push("\n");
      lastX = null;
      lastWidth = null;
    } else {
      lastX = currentX;
      lastWidth = currentWidth;
    }
  }

  return parts.join("").trim();
}

export async function extractPdfText(data: Uint8Array): Promise<ExtractedPdfText> {
  const { getDocument } = await loadPdfJs();
  const pdf = await getDocument({ data, standardFontDataUrl: STANDARD_FONT_DATA_DIR }).promise;
  const pageTexts: string[] = [];

  try {
    for (let i = 1; i <= pdf.numPages; i += 1) {
      const page = await pdf.getPage(i);
      const textContent = await page.getTextContent();
      const pageText = joinTextItems(textContent.items);
      if (pageText) pageTexts.push(pageText);
      page.cleanup();
    }
  } finally {
    await pdf.destroy();
  }

  return {
    text: pageTexts.join("\n"),
    pageTexts,
  };
}
