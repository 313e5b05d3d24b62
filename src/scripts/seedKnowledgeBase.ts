/**
 * Seeds the knowledge base from a directory of Markdown files.
 *
 * Usage:
 *   npm run seed -- [--dir knowledge] [--clear]
 *
 * Each *.md file becomes one document whose id is the file name without
 * extension. The knowledge base stats are printed when done.
 */
import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { parseArgs } from "util";

import type { RagOrchestrator } from "@app/rag/RagOrchestrator";
import { loadConfig } from "@config/index";
import { createContainer } from "@container";
import type { Document } from "@domain/rag/types";
import { configureLogger, errorMessage, logger } from "@infrastructure/logging/Logger";
import { markdownTitle, normalizeMarkdown } from "@utils/markdown";
import dotenv from "dotenv";

export function slugify(filename: string): string {
  return path
    .basename(filename, path.extname(filename))
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export async function loadMarkdownDocuments(dir: string): Promise<Document[]> {
  const entries = await fs.readdir(dir);
  const files = entries.filter((name) => name.endsWith(".md")).sort();

  const documents: Document[] = [];

  for (const filename of files) {
    const raw = await fs.readFile(path.join(dir, filename), "utf-8");
    const text = normalizeMarkdown(raw);

    if (!text) {
      logger.log("warn", "Skipping empty knowledge file", { filename });
      continue;
    }

    documents.push({
      id: slugify(filename),
      text,
      metadata: {
        title: markdownTitle(raw) ?? slugify(filename),
        source: "knowledge-base",
        filename,
      },
    });
  }

  return documents;
}

export async function seedKnowledgeBase(
  orchestrator: Pick<RagOrchestrator, "initialize" | "clearKnowledgeBase" | "addDocuments">,
  documents: Document[],
  options: { clear?: boolean } = {}
): Promise<boolean> {
  if (!(await orchestrator.initialize())) {
    return false;
  }

  if (options.clear && !(await orchestrator.clearKnowledgeBase())) {
    return false;
  }

  return orchestrator.addDocuments(documents);
}

async function main(): Promise<void> {
  dotenv.config();

  const { values } = parseArgs({
    options: {
      dir: { type: "string", default: "knowledge" },
      clear: { type: "boolean", default: false },
    },
  });

  const config = loadConfig(process.env);
  configureLogger({
    level: config.observability.logLevel,
    filePath: config.observability.logFile,
  });

  const container = createContainer(config);
  const dir = path.resolve(values.dir ?? "knowledge");

  try {
    const documents = await loadMarkdownDocuments(dir);
    logger.log("info", "Seeding knowledge base", {
      dir,
      documents: documents.length,
      clear: values.clear ?? false,
    });

    const ok = await seedKnowledgeBase(container.orchestrator, documents, {
      clear: values.clear,
    });

    if (!ok) {
      logger.log("error", "Seeding failed");
      process.exitCode = 1;
      return;
    }

    const stats = await container.orchestrator.getStats();
    console.log(JSON.stringify(stats, null, 2));
  } finally {
    await container.close();
  }
}

const invokedDirectly =
  process.argv[1] !== undefined &&
  path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
  main().catch((err: unknown) => {
    logger.log("error", "Seed script failed", { message: errorMessage(err) });
    process.exitCode = 1;
  });
}
