import { NamespaceBody, NamespaceDescriptor } from '../types';

export const NO_NAMESPACE_SENTINEL = 'NO_NAMESPACE_FOUND';

export const CLASSIFICATION_PROMPT = `You route a user's question to the knowledge namespace that can answer it.
Read the query, work out what the user wants to know, and compare it with every namespace listed below.

Respond with exactly ONE of:
- the namespace_id of the single best matching namespace, written exactly as listed (e.g. namespace_001)
- ${NO_NAMESPACE_SENTINEL} if no namespace covers the query

Never return more than one id. No explanations, no punctuation, no extra text.

Available namespaces:
{{NAMESPACES}}`;

export const SYNTHESIS_PROMPT = `You are an educational assistant answering from a single knowledge namespace.
You receive the user's query and the full namespace data.
- Answer using the namespace data; if it only covers the topic in general, give the closest relevant information.
- Include formulas, steps or examples when the query asks for them.
- Break complex ideas into simple terms and use line breaks for readability.
- Be clear, accurate and concise.`;

export const formatDescriptor = (descriptor: NamespaceDescriptor): string =>
  [
    `Namespace ID: ${descriptor.id}`,
    `Title: ${descriptor.label}`,
    `Description: ${descriptor.summary}`,
  ].join('\n');

export const buildClassificationInstructions = (descriptors: readonly NamespaceDescriptor[]): string =>
  // A replacer function keeps `$` sequences in descriptors literal.
  CLASSIFICATION_PROMPT.replace('{{NAMESPACES}}', () => descriptors.map(formatDescriptor).join('\n\n'));

export const buildClassificationInput = (queryText: string): string => `User Query: ${queryText}`;

export const renderBody = (body: NamespaceBody): string =>
  typeof body === 'string' ? body : JSON.stringify(body, null, 2);

export const buildSynthesisInput = (queryText: string, body: NamespaceBody): string =>
  `User Query: ${queryText}

Namespace Data:
${renderBody(body)}

Based on the namespace data above, answer the user's query.`;
