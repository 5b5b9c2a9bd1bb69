export {
  buildPrompt,
  joinPassages,
  createPromptTemplate,
  DEFAULT_PROMPT_TEMPLATE,
  CONTEXT_PLACEHOLDER,
  QUESTION_PLACEHOLDER,
  PASSAGE_SEPARATOR,
  ANSWER_CUE,
  type PromptTemplate,
} from './prompt_builder.js';
