export type KeyToken = {
  code: string;
  label: string;
};

export type ClassifiedLine =
  | { kind: "section-header"; text: string }
  | { kind: "sub-section-header"; prefix: string; text: string }
  | { kind: "key"; token: KeyToken }
  | { kind: "value"; text: string };

export type PositionsdatenTemplate = {
  name: string;
  sectionHeader: RegExp;
  subSectionHeader: RegExp;
  keyLine: RegExp;
  packagePrefix: string;
};

export type KeyAlias = {
  label: string;
  code: string;
};

export type ArticleRecord = {
  main: Map<string, string>;
  packages?: Map<string, string>;
  unmapped?: string[];
};

export type FlatRow = Map<string, string>;

export type PositionTable = {
  columns: string[];
  rows: FlatRow[];
};

export type CollisionRule = "packages-wins" | "main-wins";

export type FlattenOptions = {
  collision?: CollisionRule;
};

export type PositionsdatenParserMeta = {
  template: string;
  version: string;
  source: "text" | "pdf";
};

export type PositionsdatenResult = {
  articles: ArticleRecord[];
  table: PositionTable;
  warnings: string[];
  parser: PositionsdatenParserMeta;
};
