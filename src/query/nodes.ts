/**
 * Query graph node implementations.
 */
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HumanMessage, SystemMessage, type MessageContent } from '@langchain/core/messages';
import type { QueryConfig } from '../config.js';
import { ConfigurationError, toProviderError } from '../errors.js';
import type { CollectionIndex } from '../rag/collectionIndex.js';
import {
  EMPTY_RESPONSE,
  SYSTEM_PROMPT,
  formatChunk,
  qaPrompt,
  refinePrompt,
  summaryPrompt,
} from './prompts.js';
import type { SynthesisStateType } from './state.js';
import { packTexts, type TokenCounter } from './tokenizer.js';

export function messageText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

/**
 * Node implementations for the query graph.
 */
export class SynthesisNodes {
  private readonly index: CollectionIndex;
  private readonly llm: BaseChatModel;
  private readonly config: QueryConfig;
  private readonly tokens: TokenCounter;

  constructor(index: CollectionIndex, llm: BaseChatModel, config: QueryConfig, tokens: TokenCounter) {
    this.index = index;
    this.llm = llm;
    this.config = config;
    this.tokens = tokens;
  }

  /**
   * Retrieve the chunks most similar to the question.
   */
  async retrieve(state: SynthesisStateType): Promise<Partial<SynthesisStateType>> {
    const results = await this.index.similaritySearch(state.question, this.config.similarityTopK);
    const retrieved = results.map(([doc]) => doc);

    if (retrieved.length === 0) {
      return { retrieved, answer: EMPTY_RESPONSE };
    }
    return { retrieved };
  }

  /**
   * Stuff as many chunks per prompt as fit; refine across prompts.
   */
  async compact(state: SynthesisStateType): Promise<Partial<SynthesisStateType>> {
    const budget = this.contextBudget(refinePrompt(state.question, '', ''), this.config.numOutput);
    const packs = packTexts(state.retrieved.map(formatChunk), budget, this.tokens);
    return { answer: await this.refineOver(state.question, packs) };
  }

  /**
   * One prompt per chunk, each refining the previous answer.
   */
  async refine(state: SynthesisStateType): Promise<Partial<SynthesisStateType>> {
    const budget = this.contextBudget(refinePrompt(state.question, '', ''), this.config.numOutput);
    const texts = state.retrieved
      .map(formatChunk)
      .flatMap((text) => this.tokens.split(text, budget));
    return { answer: await this.refineOver(state.question, texts) };
  }

  /**
   * Answer per packed group, then combine the partial answers level by level.
   */
  async treeSummarize(state: SynthesisStateType): Promise<Partial<SynthesisStateType>> {
    const budget = this.contextBudget(summaryPrompt(state.question, ''), 0);
    let texts = state.retrieved.map(formatChunk);

    for (;;) {
      const packs = packTexts(texts, budget, this.tokens);
      if (packs.length === 1) {
        return { answer: await this.complete(summaryPrompt(state.question, packs[0])) };
      }

      const partials: string[] = [];
      for (const pack of packs) {
        partials.push(await this.complete(summaryPrompt(state.question, pack)));
      }

      // No reduction possible within the budget: combine everything in one prompt
      if (partials.length >= texts.length) {
        return { answer: await this.complete(summaryPrompt(state.question, partials.join('\n\n'))) };
      }
      texts = partials;
    }
  }

  private async refineOver(question: string, contexts: string[]): Promise<string> {
    let answer = await this.complete(qaPrompt(question, contexts[0]));
    for (const context of contexts.slice(1)) {
      answer = await this.complete(refinePrompt(question, answer, context));
    }
    return answer;
  }

  /**
   * Tokens left for context once the system prompt, the empty template and
   * the answer allowance are taken out of the context window.
   */
  private contextBudget(emptyTemplate: string, reserved: number): number {
    const budget =
      this.config.contextWindow -
      this.config.numOutput -
      reserved -
      this.tokens.count(SYSTEM_PROMPT) -
      this.tokens.count(emptyTemplate);

    if (budget <= 0) {
      throw new ConfigurationError(
        `Context window of ${this.config.contextWindow} tokens leaves no room for retrieved context`
      );
    }
    return budget;
  }

  private async complete(prompt: string): Promise<string> {
    try {
      const response = await this.llm.invoke([new SystemMessage(SYSTEM_PROMPT), new HumanMessage(prompt)]);
      return messageText(response.content).trim();
    } catch (error) {
      throw toProviderError('LLM request failed', error);
    }
  }
}
