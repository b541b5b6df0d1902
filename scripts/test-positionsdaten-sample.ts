import { strict as assert } from "node:assert";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { describe, mock, test } from "node:test";
import { fileURLToPath } from "node:url";

import { StructureNotFoundError } from "../src/lib/positionsdaten/errors";
import { toPlainRows } from "../src/lib/positionsdaten/flatten";
import {
  parsePositionsdatenPdf,
  parsePositionsdatenText,
} from "../src/lib/positionsdaten/parsePositionsdaten";
import { VERSION } from "../src/lib/positionsdaten/templates/evd";
import { applyKeyAliases } from "../src/lib/positionsdaten/utils";
import { buildTextPdf } from "./pdf-fixture";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readSample(file: string): string {
  return readFileSync(resolve(__dirname, `../samples/${file}`), "utf8");
}

describe("parsePositionsdatenText", () => {
  test("zwei Positionen mit je drei Feldern", () => {
    const result = parsePositionsdatenText(readSample("evd_two_positions.txt"));

    assert.equal(result.articles.length, 2);
    for (const article of result.articles) {
      assert.equal(article.main.size, 3);
      assert.equal(article.packages, undefined);
    }
    assert.deepEqual(result.table.columns, [
      "Positionsnummer",
      "Verbrauchsteuer-Produktcode",
      "KN-Code",
    ]);
    assert.deepEqual(toPlainRows(result.table), [
      { Positionsnummer: "1", "Verbrauchsteuer-Produktcode": "B000", "KN-Code": "22030001" },
      { Positionsnummer: "2", "Verbrauchsteuer-Produktcode": "W200", "KN-Code": "22042109" },
    ]);
    assert.deepEqual(result.warnings, []);
    assert.deepEqual(result.parser, {
      template: "e-VD/v-e-VD Positionsdaten",
      version: VERSION,
      source: "text",
    });
  });

  test("Mengeneinheit wird als Feld 17w gelesen", () => {
    const result = parsePositionsdatenText(readSample("evd_packstuecke.txt"));
    const [article] = result.articles;

    assert.deepEqual([...article.main], [
      ["Positionsnummer", "1"],
      ["Menge", "1200,000"],
      ["Bruttogewicht", "1315,500"],
      ["Mengeneinheit", "Liter"],
    ]);
    assert.deepEqual([...(article.packages ?? [])], [
      ["Art der Packstücke", "BO"],
      ["Anzahl der Packstücke", "1600"],
    ]);
    assert.deepEqual(result.table.columns, [
      "Positionsnummer",
      "Menge",
      "Bruttogewicht",
      "Mengeneinheit",
      "Art der Packstücke",
      "Anzahl der Packstücke",
    ]);
    assert.deepEqual(result.warnings, []);
  });

  test("ohne Aliase verschieben sich die Werte und werden gemeldet", () => {
    const result = parsePositionsdatenText(readSample("evd_packstuecke.txt"), { keyAliases: [] });
    const [article] = result.articles;

    assert.equal(article.main.get("Menge"), "Mengeneinheit");
    assert.equal(article.packages?.get("Anzahl der Packstücke"), "Liter");
    assert.deepEqual(article.unmapped, ["BO", "1600"]);
    assert.deepEqual(result.warnings, ["Position 1: 2 Wert(e) ohne Feld verworfen"]);
    assert.equal(result.table.rows[0].has("BO"), false);
  });

  test("Kollisionsregel wird an die Tabelle weitergereicht", () => {
    const text = "17 POSITIONSDATEN\n17b Anzahl\n17.1b Anzahl\n3\n12\n";

    assert.equal(parsePositionsdatenText(text).table.rows[0].get("Anzahl"), "12");
    assert.equal(
      parsePositionsdatenText(text, { collision: "main-wins" }).table.rows[0].get("Anzahl"),
      "3",
    );
  });

  test("Text ohne Positionsdaten ist ein harter Fehler", () => {
    assert.throws(() => parsePositionsdatenText("Rechnung\nSumme 10,00\n"), StructureNotFoundError);
  });
});

describe("parsePositionsdatenPdf", () => {
  test("liest Positionsdaten aus dem PDF-Text", async () => {
    const result = await parsePositionsdatenPdf({
      data: buildTextPdf(["17 POSITIONSDATEN", "17a Positionsnummer", "1"]),
    });

    assert.deepEqual(result.table.rows.map((row) => [...row]), [[["Positionsnummer", "1"]]]);
    assert.deepEqual(result.warnings, []);
    assert.equal(result.parser.source, "pdf");
  });

  test("meldet zu wenig Text und parst trotzdem", async () => {
    const result = await parsePositionsdatenPdf({ data: buildTextPdf(["17 POSITIONSDATEN"]) });

    assert.deepEqual(result.warnings, ["PDF enthält keinen lesbaren Text"]);
    assert.equal(result.articles.length, 1);
    assert.equal(result.articles[0].main.size, 0);
  });

  test("fast leeres PDF: Warnung im Log und StructureNotFoundError", async () => {
    const warn = mock.method(console, "warn", () => {});
    try {
      await assert.rejects(
        parsePositionsdatenPdf({ data: buildTextPdf(["Seite 1"]) }),
        StructureNotFoundError,
      );
      assert.ok(warn.mock.calls.some((call) => call.arguments[0] === "PDF enthält keinen lesbaren Text"));
    } finally {
      warn.mock.restore();
    }
  });
});

describe("applyKeyAliases", () => {
  test("setzt den Feldcode vor die Zeile und lässt andere Zeilen unverändert", () => {
    assert.equal(
      applyKeyAliases('  x  \r\n  "Mengeneinheit"\nLiter', [{ label: "Mengeneinheit", code: "17w" }]),
      "  x  \r\n17w Mengeneinheit\nLiter",
    );
  });

  test("ohne Aliase bleibt der Text gleich", () => {
    assert.equal(applyKeyAliases("Mengeneinheit\n", []), "Mengeneinheit\n");
  });
});
