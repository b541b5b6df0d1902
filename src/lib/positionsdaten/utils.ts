import { DEFAULT_KEY_ALIASES } from "./templates/evd";
import type { ClassifiedLine, KeyAlias, PositionsdatenTemplate } from "./types";

export function normaliseLine(line: string): string {
  let trimmed = line.trim();
  if (trimmed.startsWith('"')) trimmed = trimmed.slice(1);
  if (trimmed.endsWith('"')) trimmed = trimmed.slice(0, -1);
  return trimmed.trim();
}

export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/).map(normaliseLine).filter(Boolean);
}

// Template flags carry over; g and y are dropped so `test` keeps no lastIndex.
export function sectionHeaderPattern(template: PositionsdatenTemplate, extraFlags = ""): RegExp {
  const flags = new Set(`${template.sectionHeader.flags.replace(/[gy]/g, "")}${extraFlags}`);
  return new RegExp(`^[ \\t]*"?[ \\t]*(?:${template.sectionHeader.source})`, Array.from(flags).join(""));
}

export function classifyLine(
  line: string,
  template: PositionsdatenTemplate,
  sectionHeader: RegExp = sectionHeaderPattern(template),
): ClassifiedLine {
  if (sectionHeader.test(line)) {
    return { kind: "section-header", text: line };
  }

  const subSection = line.match(template.subSectionHeader);
  if (subSection) {
    return { kind: "sub-section-header", prefix: subSection[1] ?? "", text: line };
  }

  const key = line.match(template.keyLine);
  if (key?.[1]) {
    const code = key[1];
    const label = key[2]?.trim() || code;
    return { kind: "key", token: { code, label } };
  }

  return { kind: "value", text: line };
}

export function isPackageKey(code: string, template: PositionsdatenTemplate): boolean {
  return code.toLowerCase().startsWith(template.packagePrefix.toLowerCase());
}

export function applyKeyAliases(rawText: string, aliases: KeyAlias[] = DEFAULT_KEY_ALIASES): string {
  const active = aliases.filter((alias) => alias.label && alias.code);
  if (!active.length) return rawText;

  return rawText
    .split(/(\r\n|\r|\n)/)
    .map((line) => {
      const normalised = normaliseLine(line);
      const alias = active.find((entry) => normalised.startsWith(entry.label));
      return alias ? `${alias.code} ${normalised}` : line;
    })
    .join("");
}

export function mergeWarnings(...collections: Array<string | string[] | undefined>): string[] {
  const joined: string[] = [];
  for (const set of collections) {
    if (!set) continue;
    if (Array.isArray(set)) joined.push(...set.filter(Boolean));
    else joined.push(set);
  }
  return Array.from(new Set(joined.filter(Boolean)));
}
