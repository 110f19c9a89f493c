/**
 * Generate a sample contract template and client list.
 *
 * Writes samples/contract_template.docx (body paragraphs plus a client
 * details table, all with {field} placeholders) and samples/clients.csv,
 * so the CLI can be tried without preparing a real template:
 *
 *   npm run sample:template
 *   npm run fill -- -t samples/contract_template.docx -d samples/clients.csv -o out --no-pdf
 */

import {
  Document,
  Packer,
  Paragraph,
  TextRun,
  Table,
  TableRow,
  TableCell,
  WidthType,
} from "docx";
import { writeFileSync, mkdirSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const SAMPLE_DIR = path.resolve(__dirname, "..", "samples");

function textPara(text: string): Paragraph {
  return new Paragraph({
    children: [new TextRun(text)],
  });
}

function heading(text: string): Paragraph {
  return new Paragraph({
    children: [new TextRun({ text, bold: true, size: 28 })],
  });
}

function labelled(label: string, placeholder: string): Paragraph {
  return new Paragraph({
    children: [new TextRun({ text: `${label}: `, bold: true }), new TextRun(placeholder)],
  });
}

function detailRow(label: string, placeholder: string): TableRow {
  return new TableRow({
    children: [
      new TableCell({
        children: [new Paragraph({ children: [new TextRun({ text: label, bold: true })] })],
        width: { size: 3000, type: WidthType.DXA },
      }),
      new TableCell({
        children: [textPara(placeholder)],
        width: { size: 6000, type: WidthType.DXA },
      }),
    ],
  });
}

export async function buildSampleTemplate(): Promise<Buffer> {
  const children: (Paragraph | Table)[] = [
    heading("SERVICE AGREEMENT"),
    textPara(""),
    textPara(
      "This agreement is made on {start_date} between Example Services Ltd. and {name} {surname} of {company}.",
    ),
    textPara(""),
    heading("Client details"),
    new Table({
      width: { size: 9000, type: WidthType.DXA },
      rows: [
        detailRow("Name", "{name} {surname}"),
        detailRow("Company", "{company}"),
        detailRow("Email", "{email}"),
        detailRow("Monthly fee", "{fee} EUR"),
      ],
    }),
    textPara(""),
    labelled("Start date", "{start_date}"),
    textPara(""),
    textPara("Signed by {name} {surname}."),
  ];

  const doc = new Document({
    sections: [{ children }],
  });
  return Packer.toBuffer(doc);
}

const SAMPLE_CLIENTS = [
  "Name,Surname,Company,Email,Fee,Start Date",
  "Ana,Kovacs,Kovacs Design,ana@example.com,1200,2024-03-01",
  "Mehmet,Yilmaz,Yilmaz Lojistik,mehmet@example.com,950,2024-04-15",
  "Lea,Novak,,lea@example.com,700,2024-05-02",
].join("\n");

async function main() {
  mkdirSync(SAMPLE_DIR, { recursive: true });
  const templatePath = path.join(SAMPLE_DIR, "contract_template.docx");
  const clientsPath = path.join(SAMPLE_DIR, "clients.csv");

  writeFileSync(templatePath, await buildSampleTemplate());
  writeFileSync(clientsPath, `${SAMPLE_CLIENTS}\n`);

  console.log(`  ✓ Template: ${templatePath}`);
  console.log(`  ✓ Clients:  ${clientsPath}`);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
