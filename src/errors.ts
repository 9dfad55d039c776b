export class ChunkerError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ConfigError extends ChunkerError {}
export class ChunkingError extends ChunkerError {}
