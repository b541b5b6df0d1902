const encoder = new TextEncoder();

function escapePdfString(text: string): string {
  return text.replace(/[\\()]/g, (char) => `\\${char}`);
}

/**
 * Builds a one-page PDF with one Helvetica text line per entry, top to bottom.
 * Only ASCII text is supported.
 */
export function buildTextPdf(lines: string[]): Uint8Array {
  const content = lines
    .map((line, idx) => `BT /F1 12 Tf 50 ${780 - idx * 20} Td (${escapePdfString(line)}) Tj ET`)
    .join("\n");

  const objects = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
    "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 595 842] /Resources << /Font << /F1 4 0 R >> >> /Contents 5 0 R >>",
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>",
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
  ];

  let body = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((object, idx) => {
    offsets.push(body.length);
    body += `${idx + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = body.length;
  const xrefEntries = offsets.map((offset) => `${String(offset).padStart(10, "0")} 00000 n \n`).join("");
  body +=
    `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n${xrefEntries}` +
    `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return encoder.encode(body);
}
