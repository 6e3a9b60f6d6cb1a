/**
 * Synthesis workflow state.
 */
import { Annotation } from '@langchain/langgraph';
import type { Document } from '@langchain/core/documents';
import type { ResponseMode } from '../config.js';

/**
 * State that flows through the query graph.
 */
export const SynthesisState = Annotation.Root({
  // User input
  question: Annotation<string>,
  responseMode: Annotation<ResponseMode>,

  // Retrieved context, best match first
  retrieved: Annotation<Document[]>,

  // LLM response
  answer: Annotation<string>,
});

export type SynthesisStateType = typeof SynthesisState.State;
