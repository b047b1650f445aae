import { describeError, isPermanentServiceError, PipelineError } from '../errors';
import { KnowledgeCatalog } from '../store/catalog';
import { Answer, ClassificationResult, GenerationCapability, PipelineState, Query } from '../types';
import { classify } from './classify';
import { accept } from './intake';
import { synthesize } from './synthesize';

export const OUT_OF_DOMAIN_MESSAGE =
  "Sorry, I couldn't match your question to any of the available knowledge areas. Try rephrasing it or ask about another topic.";

export const TEMPORARY_FAILURE_MESSAGE =
  'Sorry, I could not put together an answer right now because the language model is unavailable. Please try again in a moment.';

export type TransitionContext = {
  query: Query;
  classification?: ClassificationResult;
  answer?: Answer;
};

export type PipelineHooks = {
  onTransition?: (state: PipelineState, context: TransitionContext) => void;
};

export const handleQuery = async (
  raw: string,
  catalog: KnowledgeCatalog,
  generator: GenerationCapability,
  hooks: PipelineHooks = {},
): Promise<Answer> => {
  const query = accept(raw);
  hooks.onTransition?.('received', { query });

  const classification = await classify(query, catalog, generator);
  hooks.onTransition?.('classified', { query, classification });

  if (classification.kind === 'unmatched') {
    const answer: Answer = {
      text: OUT_OF_DOMAIN_MESSAGE,
      sourceNamespaceId: null,
      status: 'no_match',
      diagnostic: classification.detail,
    };
    hooks.onTransition?.('no_match_answered', { query, classification, answer });
    return answer;
  }

  const content = catalog.getContent(classification.namespaceId);

  if (!content) {
    throw new PipelineError('KNOWLEDGE_STORE', `Namespace "${classification.namespaceId}" has no content.`);
  }

  try {
    const answer = await synthesize(query, content, generator);
    hooks.onTransition?.('answered', { query, classification, answer });
    return answer;
  } catch (error) {
    if (isPermanentServiceError(error)) {
      throw error;
    }

    console.error(`Synthesis failed for query ${query.id} in ${content.id}:`, describeError(error));

    const answer: Answer = {
      text: TEMPORARY_FAILURE_MESSAGE,
      sourceNamespaceId: content.id,
      status: 'failed',
      diagnostic: describeError(error),
    };
    hooks.onTransition?.('failed', { query, classification, answer });
    return answer;
  }
};

/**
 * Binds the pipeline to one catalog and one generator for the process lifetime.
 */
export class Orchestrator {
  constructor(
    private readonly catalog: KnowledgeCatalog,
    private readonly generator: GenerationCapability,
    private readonly hooks: PipelineHooks = {},
  ) {}

  handle(raw: string): Promise<Answer> {
    return handleQuery(raw, this.catalog, this.generator, this.hooks);
  }
}
