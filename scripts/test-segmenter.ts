import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { StructureNotFoundError } from "../src/lib/positionsdaten/errors";
import { parseArticles } from "../src/lib/positionsdaten/parseArticles";
import { parseSegment } from "../src/lib/positionsdaten/parseSegment";
import { findSectionStarts, splitIntoSegments } from "../src/lib/positionsdaten/segmenter";
import { DEFAULT_TEMPLATE } from "../src/lib/positionsdaten/templates/evd";
import type { PositionsdatenTemplate } from "../src/lib/positionsdaten/types";

describe("splitIntoSegments", () => {
  test("liefert keine Segmente ohne Kopfzeile", () => {
    assert.deepEqual(splitIntoSegments("17a Positionsnummer\n1\n"), []);
  });

  test("erkennt Kopfzeilen nur am Zeilenanfang", () => {
    assert.deepEqual(splitIntoSegments("Feld 17 POSITIONSDATEN\n17a Positionsnummer\n"), []);
  });

  test("schneidet je Kopfzeile genau ein Segment", () => {
    const text = 'Kopf\n17 POSITIONSDATEN a\nx\n  "17 positionsdaten b\ny';
    const first = text.indexOf("17 POSITIONSDATEN a");
    const second = text.indexOf('  "17 positionsdaten b');

    assert.deepEqual(findSectionStarts(text), [first, second]);

    const segments = splitIntoSegments(text);
    assert.equal(segments.length, 2);
    assert.equal(segments[0], text.slice(first, second));
    assert.equal(segments[1], text.slice(second));
  });

  test("letztes Segment reicht bis zum Textende", () => {
    const text = "17 POSITIONSDATEN\r\n17a Positionsnummer\r\n7\r\n";
    assert.deepEqual(splitIntoSegments(text), [text]);
  });
});

describe("Vorlagen-Flags", () => {
  const caseSensitive: PositionsdatenTemplate = {
    ...DEFAULT_TEMPLATE,
    sectionHeader: /17 POSITIONSDATEN\b/,
  };

  test("eine Kopfzeile ohne i-Flag unterscheidet Groß- und Kleinschreibung", () => {
    assert.deepEqual(splitIntoSegments("17 positionsdaten\n17a A\n1\n", caseSensitive), []);
    assert.deepEqual(findSectionStarts("x\n17 POSITIONSDATEN\n", caseSensitive), [2]);
  });

  test("parseSegment behandelt abweichende Schreibung dann als Wert", () => {
    const record = parseSegment("17 POSITIONSDATEN\n17a A\n17 positionsdaten\n", caseSensitive);
    assert.deepEqual([...record.main], [["A", "17 positionsdaten"]]);
    assert.equal(record.unmapped, undefined);
  });
});

describe("parseArticles", () => {
  test("wirft StructureNotFoundError ohne Positionsdaten", () => {
    assert.throws(
      () => parseArticles("Kopfdaten\nArt des Dokuments\n"),
      (error: unknown) =>
        error instanceof StructureNotFoundError && error.name === "StructureNotFoundError",
    );
  });

  test("parst jedes Segment in Reihenfolge", () => {
    const articles = parseArticles(
      "17 POSITIONSDATEN\n17a Positionsnummer\n1\n17 POSITIONSDATEN\n17a Positionsnummer\n2\n",
    );
    assert.deepEqual(
      articles.map((article) => article.main.get("Positionsnummer")),
      ["1", "2"],
    );
  });
});
