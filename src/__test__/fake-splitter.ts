import type { GenericSplitOptions, GenericSplitter } from '../splitter/types.js';

type SplitImpl = (text: string, options: GenericSplitOptions) => string[];

const sliceBySize: SplitImpl = (text, { chunkSize }) => {
  const out: string[] = [];
  for (let offset = 0; offset < text.length; offset += chunkSize) {
    out.push(text.slice(offset, offset + chunkSize));
  }
  return out;
};

/** In-process stand-in for the LangChain splitter that records every call. */
export class FakeSplitter implements GenericSplitter {
  readonly calls: Array<{ text: string; options: GenericSplitOptions }> = [];

  constructor(private readonly impl: SplitImpl = sliceBySize) {}

  async split(text: string, options: GenericSplitOptions): Promise<string[]> {
    this.calls.push({ text, options });
    return this.impl(text, options);
  }
}
