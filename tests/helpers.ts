/**
 * Shared fixtures: temporary vaults and in-process embedding providers
 */

import crypto from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { EmbeddingProvider } from "../src/rag/embeddings/provider.js";

/**
 * Create a temporary notes folder holding `files` (root-relative path -> content)
 */
export async function createTempVault(files: Record<string, string>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "vaultweave-test-"));
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf-8");
  }
  return root;
}

export async function removeTempVault(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}

/**
 * Deterministic vector derived from the text's sha256 digest
 */
export function vectorFor(text: string, dimensions: number = 8): number[] {
  const digest = crypto.createHash("sha256").update(text, "utf8").digest();
  return Array.from({ length: dimensions }, (_, i) => (digest[i % digest.length] + 1) / 256);
}

export const noSleep = async (): Promise<void> => {};

/**
 * Embeds through `vectorFor`, recording every call
 */
export class StubEmbeddingProvider implements EmbeddingProvider {
  readonly name = "stub";
  readonly embedCalls: string[] = [];
  readonly batchCalls: string[][] = [];

  constructor(private readonly dimensions: number = 8) {}

  async embed(text: string): Promise<number[]> {
    this.embedCalls.push(text);
    return vectorFor(text, this.dimensions);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.batchCalls.push(texts);
    return texts.map((text) => vectorFor(text, this.dimensions));
  }
}

/**
 * Single-text provider failing for every text `shouldFail` accepts
 */
export class FailingEmbeddingProvider implements EmbeddingProvider {
  readonly name = "failing";
  calls = 0;

  constructor(
    private readonly shouldFail: (text: string) => boolean,
    private readonly message: string = "service unavailable"
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls++;
    if (this.shouldFail(text)) {
      throw new Error(this.message);
    }
    return vectorFor(text);
  }
}
