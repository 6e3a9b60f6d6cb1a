/**
 * Query graph construction.
 */
import { StateGraph, END } from '@langchain/langgraph';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { QueryConfig } from '../config.js';
import type { CollectionIndex } from '../rag/collectionIndex.js';
import { SynthesisState } from './state.js';
import { SynthesisNodes } from './nodes.js';
import type { TokenCounter } from './tokenizer.js';

/**
 * Create the retrieve-then-synthesize graph. The response mode on the
 * incoming state selects the synthesis node.
 */
export function createQueryGraph(
  index: CollectionIndex,
  llm: BaseChatModel,
  config: QueryConfig,
  tokens: TokenCounter
) {
  const nodes = new SynthesisNodes(index, llm, config, tokens);

  const workflow = new StateGraph(SynthesisState)
    .addNode('retrieve', (state) => nodes.retrieve(state))
    .addNode('compact', (state) => nodes.compact(state))
    .addNode('refine', (state) => nodes.refine(state))
    .addNode('treeSummarize', (state) => nodes.treeSummarize(state))

    .addEdge('__start__', 'retrieve')

    // Route on response mode; nothing retrieved means nothing to synthesize
    .addConditionalEdges(
      'retrieve',
      (state) => (state.retrieved.length === 0 ? 'empty' : state.responseMode),
      {
        empty: END,
        compact: 'compact',
        refine: 'refine',
        tree_summarize: 'treeSummarize',
      }
    )

    .addEdge('compact', END)
    .addEdge('refine', END)
    .addEdge('treeSummarize', END);

  return workflow.compile();
}

export type QueryGraph = ReturnType<typeof createQueryGraph>;
