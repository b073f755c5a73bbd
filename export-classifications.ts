#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import { parseDocument, type SemanticBlock } from "./parser";
import { loadConfig } from "./config";

export interface ClassificationExport {
  metadata: {
    document: string;
    totalSemanticBlocks: number;
    parsedAt: string;
  };
  classifications: Array<SemanticBlock & { index: number }>;
  summary: Record<string, number>;
}

export function buildClassificationExport(documentName: string, blocks: SemanticBlock[], parsedAt = new Date()): ClassificationExport {
  const summary: Record<string, number> = {};
  for (const block of blocks) {
    summary[block.type] = (summary[block.type] || 0) + 1;
  }

  return {
    metadata: {
      document: documentName,
      totalSemanticBlocks: blocks.length,
      parsedAt: parsedAt.toISOString()
    },
    classifications: blocks.map((block, idx) => ({ index: idx + 1, ...block })),
    summary
  };
}

async function main(args: string[]) {
  const [docxPath, outputPath] = args;
  if (!docxPath) {
    console.error("Usage: export-classifications <file.docx> [output.json]");
    process.exitCode = 1;
    return;
  }
  if (!fs.existsSync(docxPath)) {
    console.error(`File not found: ${docxPath}`);
    process.exitCode = 1;
    return;
  }

  console.log(`Loading DOCX file: ${docxPath}...`);
  const { semantic } = await parseDocument(fs.readFileSync(docxPath), { debug: loadConfig().debug });
  const output = buildClassificationExport(path.basename(docxPath), semantic);

  const jsonPath = outputPath || path.join(process.cwd(), "classifications.json");
  fs.writeFileSync(jsonPath, JSON.stringify(output, null, 2));
  console.log(`\nClassifications exported to: ${jsonPath}`);

  console.log(`\nSummary:`);
  Object.entries(output.summary)
    .sort((a, b) => b[1] - a[1])
    .forEach(([type, count]) => console.log(`  ${type}: ${count}`));
}

if (require.main === module) {
  main(process.argv.slice(2)).catch(error => {
    console.error(error);
    process.exitCode = 1;
  });
}
