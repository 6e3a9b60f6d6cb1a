export { QueryEngine, type QueryEngineOptions } from './engine.js';
export { createQueryGraph, type QueryGraph } from './graph.js';
export { SynthesisState, type SynthesisStateType } from './state.js';
export { TiktokenCounter, packTexts, type TokenCounter } from './tokenizer.js';
export { EMPTY_RESPONSE } from './prompts.js';
