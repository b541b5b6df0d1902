import type { KeyAlias, PositionsdatenTemplate } from "../types";

export const VERSION = "2025-10-02";

// sectionHeader is unanchored: it is matched at line start, after an optional quote.
export const DEFAULT_TEMPLATE: PositionsdatenTemplate = {
  name: "e-VD/v-e-VD Positionsdaten",
  sectionHeader: /17 POSITIONSDATEN\b/i,
  subSectionHeader: /^(17(?:\.\d+)?)\s+PACKST(?:Ü|UE|U)CKE\b/i,
  keyLine: /^(17(?:\.\d+)?[A-Za-z])(?:\s+(.*))?$/i,
  packagePrefix: "17.1",
};

// Labels the form prints without a field code.
export const DEFAULT_KEY_ALIASES: KeyAlias[] = [{ label: "Mengeneinheit", code: "17w" }];
