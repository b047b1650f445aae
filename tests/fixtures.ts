import { KnowledgeCatalog, parseKnowledgeStore } from '../src/store/catalog';
import { GenerationCapability } from '../src/types';

export type GenerationCall = {
  prompt: string;
  instructions?: string;
};

type Responder = (call: GenerationCall, index: number) => string | Promise<string>;

/**
 * Records every call and answers through the given responder.
 */
export class StubGenerator implements GenerationCapability {
  readonly calls: GenerationCall[] = [];

  constructor(private readonly respond: Responder) {}

  async generate(prompt: string, instructions?: string): Promise<string> {
    const call = { prompt, instructions };
    this.calls.push(call);
    return this.respond(call, this.calls.length - 1);
  }
}

/**
 * Replies with the given responses in order; an Error entry is thrown instead.
 */
export const scripted = (...responses: Array<string | Error>): StubGenerator =>
  new StubGenerator((_call, index) => {
    const response = responses[index];
    if (response === undefined) {
      throw new Error(`No scripted response for call ${index + 1}`);
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });

export const HISTORY_CONTENT = 'World War II lasted from 1939 to 1945.';

export const buildCatalog = (): KnowledgeCatalog =>
  parseKnowledgeStore({
    namespaces: [
      {
        namespace_id: 'namespace_001',
        title: 'Math',
        description: 'Numbers, algebra and geometry',
        topics: [{ name: 'Fractions', content: 'A fraction is a part of a whole.' }],
      },
      {
        namespace_id: 'namespace_002',
        title: 'History',
        description: 'World events and wars',
        content: HISTORY_CONTENT,
      },
    ],
  });

export class OutputCollector {
  private readonly chunks: string[] = [];

  write(chunk: string | Uint8Array): boolean {
    this.chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf-8'));
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}
