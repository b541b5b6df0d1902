import { readFileSync } from "node:fs";
import { extname, resolve } from "node:path";

import { StructureNotFoundError } from "../src/lib/positionsdaten/errors";
import { toPlainRows } from "../src/lib/positionsdaten/flatten";
import {
  parsePositionsdatenPdf,
  parsePositionsdatenText,
} from "../src/lib/positionsdaten/parsePositionsdaten";
import type { CollisionRule, PositionsdatenResult } from "../src/lib/positionsdaten/types";

const args = process.argv.slice(2);
const input = args.find((arg) => !arg.startsWith("--"));
const collision: CollisionRule = args.includes("--main-wins") ? "main-wins" : "packages-wins";

if (!input) {
  console.error("Aufruf: parse-evd <datei.pdf|datei.txt> [--main-wins]");
  process.exit(1);
}

const inputPath = resolve(process.cwd(), input);

let result: PositionsdatenResult;
try {
  result =
    extname(inputPath).toLowerCase() === ".pdf"
      ? await parsePositionsdatenPdf({ data: new Uint8Array(readFileSync(inputPath)), collision })
      : parsePositionsdatenText(readFileSync(inputPath, "utf8"), { collision });
} catch (error) {
  if (error instanceof StructureNotFoundError) {
    console.error(error.message);
    process.exit(1);
  }
  throw error;
}

console.log(
  JSON.stringify(
    {
      columns: result.table.columns,
      rows: toPlainRows(result.table),
      warnings: result.warnings,
    },
    null,
    2,
  ),
);
