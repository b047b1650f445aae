import { describeError, isPermanentServiceError } from '../errors';
import {
  buildClassificationInput,
  buildClassificationInstructions,
  NO_NAMESPACE_SENTINEL,
} from '../llm/prompts';
import { KnowledgeCatalog } from '../store/catalog';
import { ClassificationResult, GenerationCapability, Query } from '../types';

const WRAPPING_CHARS = /^[`'"*]+|[`'"*.]+$/g;

/**
 * Reduces a raw model reply to a classification. Only the first token counts;
 * ids are matched case-sensitively, the sentinel is not.
 */
export const parseClassification = (response: string, catalog: KnowledgeCatalog): ClassificationResult => {
  const [firstToken = ''] = response.trim().split(/[\s,]+/);
  const token = firstToken.replace(WRAPPING_CHARS, '');

  if (!token) {
    return { kind: 'unmatched', reason: 'empty_response' };
  }

  if (token.toUpperCase() === NO_NAMESPACE_SENTINEL) {
    return { kind: 'unmatched', reason: 'no_match' };
  }

  if (catalog.has(token)) {
    return { kind: 'matched', namespaceId: token };
  }

  return {
    kind: 'unmatched',
    reason: 'unknown_namespace',
    detail: `Model returned unknown namespace "${token}".`,
  };
};

export const classify = async (
  query: Query,
  catalog: KnowledgeCatalog,
  generator: GenerationCapability,
): Promise<ClassificationResult> => {
  let response: string;

  try {
    response = await generator.generate(
      buildClassificationInput(query.text),
      buildClassificationInstructions(catalog.descriptors()),
    );
  } catch (error) {
    if (isPermanentServiceError(error)) {
      throw error;
    }

    console.warn(`Classification failed for query ${query.id}, treating it as unmatched:`, describeError(error));

    return { kind: 'unmatched', reason: 'service_error', detail: describeError(error) };
  }

  return parseClassification(response, catalog);
};
