import { buildSynthesisInput, SYNTHESIS_PROMPT } from '../llm/prompts';
import { Answer, GenerationCapability, NamespaceContent, Query } from '../types';

export const synthesize = async (
  query: Query,
  content: NamespaceContent,
  generator: GenerationCapability,
): Promise<Answer> => {
  const text = await generator.generate(buildSynthesisInput(query.text, content.body), SYNTHESIS_PROMPT);

  return {
    text,
    sourceNamespaceId: content.id,
    status: 'answered',
  };
};
