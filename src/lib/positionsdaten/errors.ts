export class StructureNotFoundError extends Error {
  readonly templateName: string;

  constructor(templateName: string) {
    super(`Keine Blöcke der Vorlage "${templateName}" im Text gefunden.`);
    this.name = "StructureNotFoundError";
    this.templateName = templateName;
  }
}
