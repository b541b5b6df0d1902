import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { flattenArticles, tableCell, toPlainRows } from "../src/lib/positionsdaten/flatten";
import type { ArticleRecord } from "../src/lib/positionsdaten/types";

const first: ArticleRecord = {
  main: new Map([
    ["Positionsnummer", "1"],
    ["KN-Code", "22030001"],
  ]),
  unmapped: ["übrig"],
};

const second: ArticleRecord = {
  main: new Map([
    ["KN-Code", "22042109"],
    ["Menge", "750"],
  ]),
  packages: new Map([["Art der Packstücke", "BO"]]),
};

describe("flattenArticles", () => {
  test("erzeugt eine Zeile je Position in Eingabereihenfolge", () => {
    const table = flattenArticles([first, second]);

    assert.equal(table.rows.length, 2);
    assert.deepEqual(table.columns, ["Positionsnummer", "KN-Code", "Menge", "Art der Packstücke"]);
    assert.deepEqual([...table.rows[0]], [
      ["Positionsnummer", "1"],
      ["KN-Code", "22030001"],
    ]);
    assert.deepEqual([...table.rows[1]], [
      ["KN-Code", "22042109"],
      ["Menge", "750"],
      ["Art der Packstücke", "BO"],
    ]);
  });

  test("verwirft unmapped-Werte", () => {
    const [row] = flattenArticles([first]).rows;
    assert.ok(![...row.values()].includes("übrig"));
    assert.equal(row.size, 2);
  });

  test("fehlende Spalten lesen sich als leerer Text", () => {
    const table = flattenArticles([first, second]);
    assert.equal(table.rows[0].has("Menge"), false);
    assert.equal(tableCell(table.rows[0], "Menge"), "");
    assert.deepEqual(toPlainRows(table)[0], {
      Positionsnummer: "1",
      "KN-Code": "22030001",
      Menge: "",
      "Art der Packstücke": "",
    });
  });

  test("Kollision zwischen Haupt- und Packstückfeldern ist konfigurierbar", () => {
    const record: ArticleRecord = {
      main: new Map([
        ["Anzahl", "haupt"],
        ["Menge", "5"],
      ]),
      packages: new Map([["Anzahl", "packstück"]]),
    };

    assert.equal(flattenArticles([record]).rows[0].get("Anzahl"), "packstück");
    assert.equal(
      flattenArticles([record], { collision: "main-wins" }).rows[0].get("Anzahl"),
      "haupt",
    );
    assert.deepEqual(flattenArticles([record]).columns, ["Anzahl", "Menge"]);
  });

  test("leere Eingabe ergibt leere Tabelle", () => {
    assert.deepEqual(flattenArticles([]), { columns: [], rows: [] });
  });
});
