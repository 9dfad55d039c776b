/** A source file as handed over by the repository fetcher. Never mutated. */
export interface FileRecord {
  readonly path: string;
  readonly content: string;
  /** Lowercase language tag, or `'unknown'`. */
  readonly language: string;
  /** UTF-8 byte length of `content`. */
  readonly size: number;
}

export interface ChunkMetadata {
  class_name?: string;
  function_name?: string;
}

export interface Chunk {
  id: string;
  filePath: string;
  /** `File: <path>`, a blank line, then the fragment text. */
  content: string;
  language: string;
  metadata: ChunkMetadata;
}

export interface GenericSplitOptions {
  chunkSize: number;
  chunkOverlap: number;
  language?: string;
}

/**
 * Hierarchical splitter used for every file the structural path does not handle.
 * Implementations must be deterministic for identical input.
 */
export interface GenericSplitter {
  split(text: string, options: GenericSplitOptions): Promise<string[]>;
}
