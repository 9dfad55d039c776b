import { getConfig, type ChunkerConfig } from '../config.js';
import { ChunkerError, ChunkingError } from '../errors.js';
import { MethodSplitter } from '../splitter/method-splitter.js';
import { RecursiveSplitter, separatorLanguages } from '../splitter/recursive.js';
import { extractSymbolContext } from '../splitter/symbol-extract.js';
import type { Chunk, ChunkMetadata, FileRecord, GenericSplitter } from '../splitter/types.js';
import { buildSizeTiers, selectSizeTier, type SizeTier } from './size-tier.js';

export interface CodeChunkerOptions {
  /** Defaults to the environment-derived config. */
  config?: ChunkerConfig;
  /** Defaults to the LangChain-backed {@link RecursiveSplitter}. */
  splitter?: GenericSplitter;
}

export interface ChunkerStats {
  supportedLanguages: string[];
  structuralLanguage: string;
  dynamicSizing: boolean;
  collapseRatio: number;
  sizeTiers: readonly SizeTier[];
}

export function chunkId(scopeId: string | number, filePath: string, index: number): string {
  return `repo_${scopeId}_${filePath}_${index}`;
}

export function withPathHeader(filePath: string, text: string): string {
  return `File: ${filePath}\n\n${text}`;
}

/**
 * Turns a file into ordered, header-tagged chunks. Java-like files with at
 * least two methods are split per method; everything else goes through the
 * generic splitter with a target size picked from the content length.
 *
 * Instances hold only immutable configuration and may be shared freely.
 */
export class CodeChunker {
  private readonly config: ChunkerConfig;
  private readonly tiers: readonly SizeTier[];
  private readonly methodSplitter: MethodSplitter;
  private readonly splitter: GenericSplitter;

  constructor(options: CodeChunkerOptions = {}) {
    this.config = options.config ?? getConfig();
    this.tiers = buildSizeTiers(this.config);
    this.methodSplitter = new MethodSplitter(this.config.structuralLanguage);
    this.splitter = options.splitter ?? new RecursiveSplitter();
  }

  /** Never rejects: on any failure the whole file comes back as one chunk. */
  async chunkFile(file: FileRecord, scopeId: string | number): Promise<Chunk[]> {
    try {
      if (file.content.trim().length === 0) return [];

      const fragments = this.methodSplitter.isApplicable(file.content, file.language)
        ? this.methodSplitter.split(file.content)
        : await this.splitGeneric(file);

      return fragments.map((text, index) => this.buildChunk(file, scopeId, index, text));
    } catch (err) {
      const cause = err instanceof ChunkerError && err.cause !== undefined ? ` (cause: ${err.cause})` : '';
      console.warn(`Chunking failed for "${file.path}", falling back to a single chunk: ${err}${cause}`);
      return [this.buildChunk(file, scopeId, 0, file.content)];
    }
  }

  supportedLanguages(): string[] {
    return separatorLanguages();
  }

  stats(): ChunkerStats {
    return {
      supportedLanguages: this.supportedLanguages(),
      structuralLanguage: this.config.structuralLanguage,
      dynamicSizing: this.config.dynamicSizing,
      collapseRatio: this.config.collapseRatio,
      sizeTiers: this.tiers,
    };
  }

  private async splitGeneric(file: FileRecord): Promise<string[]> {
    const { content } = file;
    if (!this.config.dynamicSizing) return [content];

    const tier = selectSizeTier(content.length, this.tiers);
    if (!tier || tier.chunkSize === null) return [content];

    let fragments: string[];
    try {
      fragments = await this.splitter.split(content, {
        chunkSize: tier.chunkSize,
        chunkOverlap: tier.chunkOverlap,
        language: file.language,
      });
    } catch (err) {
      throw new ChunkingError(`Generic splitter failed on ${tier.name} file "${file.path}"`, err);
    }

    if (fragments.length === 0) return [content];
    // A lone fragment close to the target size is just a trimmed copy of the file.
    const [only] = fragments;
    if (fragments.length === 1 && only.length < tier.chunkSize * this.config.collapseRatio) {
      return [content];
    }
    return fragments;
  }

  private buildChunk(file: FileRecord, scopeId: string | number, index: number, text: string): Chunk {
    const context = extractSymbolContext(text, file.language);
    const metadata: ChunkMetadata = {};
    if (context.className) metadata.class_name = context.className;
    if (context.functionName) metadata.function_name = context.functionName;

    return {
      id: chunkId(scopeId, file.path, index),
      filePath: file.path,
      content: withPathHeader(file.path, text),
      language: file.language,
      metadata,
    };
  }
}
