import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { parseSegment } from "../src/lib/positionsdaten/parseSegment";
import { DEFAULT_TEMPLATE } from "../src/lib/positionsdaten/templates/evd";
import { classifyLine, normaliseLine } from "../src/lib/positionsdaten/utils";

describe("normaliseLine", () => {
  test("entfernt Leerraum und eine Ebene Anführungszeichen", () => {
    assert.equal(normaliseLine('"  Mengeneinheit  "'), "Mengeneinheit");
    assert.equal(normaliseLine('""x""'), '"x"');
  });
});

describe("classifyLine", () => {
  test("unterscheidet Kopfzeile, Unterabschnitt, Schlüssel und Wert", () => {
    assert.deepEqual(classifyLine("17 POSITIONSDATEN e-VD/v-e-VD", DEFAULT_TEMPLATE), {
      kind: "section-header",
      text: "17 POSITIONSDATEN e-VD/v-e-VD",
    });
    assert.deepEqual(classifyLine("17.1 PACKSTUECKE", DEFAULT_TEMPLATE), {
      kind: "sub-section-header",
      prefix: "17.1",
      text: "17.1 PACKSTUECKE",
    });
    assert.deepEqual(classifyLine("17.1a Art der Packstücke", DEFAULT_TEMPLATE), {
      kind: "key",
      token: { code: "17.1a", label: "Art der Packstücke" },
    });
    assert.deepEqual(classifyLine("17f", DEFAULT_TEMPLATE), {
      kind: "key",
      token: { code: "17f", label: "17f" },
    });
    assert.deepEqual(classifyLine("17abc", DEFAULT_TEMPLATE), { kind: "value", text: "17abc" });
  });
});

describe("parseSegment", () => {
  test("ordnet Schlüsselgruppe und Wertegruppe paarweise zu", () => {
    const record = parseSegment(
      "17 POSITIONSDATEN\n17a Positionsnummer\n17b Verbrauchsteuer-Produktcode\n1\nB000\n",
    );
    assert.deepEqual(
      [...record.main],
      [
        ["Positionsnummer", "1"],
        ["Verbrauchsteuer-Produktcode", "B000"],
      ],
    );
    assert.equal(record.packages, undefined);
    assert.equal(record.unmapped, undefined);
    assert.ok(!("packages" in record));
  });

  test("füllt fehlende Werte mit leerem Text", () => {
    const record = parseSegment("17a A\n17b B\n17c C\nx");
    assert.deepEqual([...record.main], [
      ["A", "x"],
      ["B", ""],
      ["C", ""],
    ]);
    assert.equal(record.unmapped, undefined);
  });

  test("meldet überzählige Werte als unmapped", () => {
    const record = parseSegment("17a A\nv1\nv2\nv3");
    assert.deepEqual([...record.main], [["A", "v1"]]);
    assert.deepEqual(record.unmapped, ["v2", "v3"]);
  });

  test("übernimmt offene Werte in die nächste Schlüsselgruppe", () => {
    const record = parseSegment("17a A\n17b B\nv1\nv2\nv3\n17c C\nv4");
    assert.deepEqual([...record.main], [
      ["A", "v1"],
      ["B", "v2"],
      ["C", "v3"],
    ]);
    assert.deepEqual(record.unmapped, ["v4"]);
  });

  test("sammelt Werte vor dem ersten Schlüssel als offene Werte", () => {
    const record = parseSegment("v0\r\n17a A\r\nv1\r\n");
    assert.deepEqual([...record.main], [["A", "v0"]]);
    assert.deepEqual(record.unmapped, ["v1"]);
  });

  test("behält bei wiederholtem Label die erste Position und den letzten Wert", () => {
    const record = parseSegment("17a A\n17b B\n1\n2\n17c A\n3");
    assert.deepEqual([...record.main], [
      ["A", "3"],
      ["B", "2"],
    ]);
  });

  test("legt Schlüssel mit Präfix 17.1 unter PACKSTÜCKE ab", () => {
    const record = parseSegment(
      [
        "17 POSITIONSDATEN",
        "17.1b Anzahl der Packstücke",
        "4",
        "17.1 PACKSTÜCKE",
        "17.1A Art der Packstücke",
        "17c KN-Code",
        "CT",
        "22030001",
      ].join("\n"),
    );
    assert.deepEqual([...record.main], [["KN-Code", "22030001"]]);
    assert.deepEqual(
      [...(record.packages ?? [])],
      [
        ["Anzahl der Packstücke", "4"],
        ["Art der Packstücke", "CT"],
      ],
    );
  });

  test("überspringt eine weitere Kopfzeile innerhalb des Segments", () => {
    const record = parseSegment("17a A\n17 POSITIONSDATEN\nx");
    assert.deepEqual([...record.main], [["A", ""]]);
    assert.deepEqual(record.unmapped, ["x"]);
  });

  test("verkraftet lange Wertefolgen vor dem ersten Schlüssel", () => {
    const values = Array.from({ length: 300000 }, (_, idx) => `v${idx}`);
    const record = parseSegment(`17 POSITIONSDATEN\n${values.join("\n")}\n17a A\n`);

    assert.deepEqual([...record.main], [["A", "v0"]]);
    assert.equal(record.unmapped?.length, 299999);
    assert.equal(record.unmapped?.[0], "v1");
    assert.equal(record.unmapped?.[299998], "v299999");
  });

  test("liefert bei wiederholtem Aufruf dasselbe Ergebnis", () => {
    const segment = "17 POSITIONSDATEN\n17a A\n17.1a P\nv1\nv2\nv3\n";
    assert.deepStrictEqual(parseSegment(segment), parseSegment(segment));
  });
});
