import { strict as assert } from "node:assert";
import { describe, test } from "node:test";
import type { TextItem } from "pdfjs-dist/types/src/display/api";

import { extractPdfText, joinTextItems } from "../src/lib/pdf/extractText";
import { buildTextPdf } from "./pdf-fixture";

function item(str: string, x: number, width: number, hasEOL = false): TextItem {
  return {
    str,
    dir: "ltr",
    transform: [1, 0, 0, 1, x, 700],
    width,
    height: 10,
    fontName: "g_d0_f1",
    hasEOL,
  };
}

describe("joinTextItems", () => {
  test("trennt Tabellenzellen bei großem Abstand", () => {
    const text = joinTextItems([
      item("17a", 50, 20),
      item("Positionsnummer", 200, 80, true),
      item("1", 50, 5, true),
    ]);
    assert.equal(text, "17a\nPositionsnummer\n1");
  });

  test("verbindet nahe Textstücke mit Leerzeichen", () => {
    const text = joinTextItems([item("Kombinierte", 50, 60), item("Nomenklatur", 112, 60, true)]);
    assert.equal(text, "Kombinierte Nomenklatur");
  });

  test("ignoriert markierte Inhalte und leere Stücke", () => {
    const text = joinTextItems([
      { type: "beginMarkedContent", id: "mc0" },
      item("Liter", 50, 20),
      item("", 80, 0, true),
      item("BO", 50, 10, true),
    ]);
    assert.equal(text, "Liter\nBO");
  });
});

describe("extractPdfText", () => {
  test("liefert eine Zeile je Textzeile der Seite", async () => {
    const { text, pageTexts } = await extractPdfText(
      buildTextPdf(["17 POSITIONSDATEN", "17a Positionsnummer", "1"]),
    );

    assert.equal(pageTexts.length, 1);
    assert.deepEqual(text.split("\n"), ["17 POSITIONSDATEN", "17a Positionsnummer", "1"]);
  });
});
