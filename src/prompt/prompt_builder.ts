/**
 * @fileoverview Prompt assembly
 *
 * Joins retrieved passages into a context block and interpolates it, with the
 * question, into an instruction template. Pure: same inputs, same prompt.
 */

import { Errors } from '../core/errors.js';
import type { Passage } from '../retrieval/types.js';

export const CONTEXT_PLACEHOLDER = '{context}';
export const QUESTION_PLACEHOLDER = '{question}';
export const PASSAGE_SEPARATOR = '\n';

/** Marks where the model's answer begins */
export const ANSWER_CUE = 'Assistant:';

/**
 * A template holding both placeholders. Brand it through
 * `createPromptTemplate` so unchecked strings never reach `buildPrompt`.
 */
export type PromptTemplate = string & { readonly __brand: 'PromptTemplate' };

const PLACEHOLDER_PATTERN = /\{(context|question)\}/g;

function isPromptTemplate(text: string): text is PromptTemplate {
  return text.includes(CONTEXT_PLACEHOLDER) && text.includes(QUESTION_PLACEHOLDER);
}

export function createPromptTemplate(text: string): PromptTemplate {
  if (!isPromptTemplate(text)) {
    throw Errors.invalidRequest(
      'template',
      `text containing ${CONTEXT_PLACEHOLDER} and ${QUESTION_PLACEHOLDER}`,
      JSON.stringify(text.length > 80 ? `${text.slice(0, 77)}...` : text)
    );
  }
  return text;
}

export const DEFAULT_PROMPT_TEMPLATE: PromptTemplate = createPromptTemplate(
  [
    '',
    '',
    'Human: You answer questions using only the information in the context below.',
    'If the context does not contain the answer, say that you do not know instead of guessing.',
    '',
    '<context>',
    CONTEXT_PLACEHOLDER,
    '</context>',
    '',
    `<question>${QUESTION_PLACEHOLDER}</question>`,
    '',
    ANSWER_CUE,
  ].join('\n')
);

export function joinPassages(passages: readonly Passage[]): string {
  return passages.map((passage) => passage.text).join(PASSAGE_SEPARATOR);
}

/**
 * Build the prompt for `query` grounded on `passages`.
 *
 * Substitution is a single pass with a replacer function, so placeholder
 * strings or `$` patterns inside passages and the query are inserted verbatim.
 */
export function buildPrompt(
  query: string,
  passages: readonly Passage[],
  template: PromptTemplate = DEFAULT_PROMPT_TEMPLATE
): string {
  const context = joinPassages(passages);
  return template.replace(PLACEHOLDER_PATTERN, (_match, name: string) =>
    name === 'context' ? context : query
  );
}
