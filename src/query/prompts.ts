/**
 * Prompt templates for answer synthesis.
 */
import type { Document } from '@langchain/core/documents';

export const SYSTEM_PROMPT = `You are an assistant that answers questions about a collection of documents,
several of which may be different versions of the same document.
Always answer using the provided context, not prior knowledge.
When versions differ, say which version (file name or date) each fact comes from.`;

export const EMPTY_RESPONSE = 'Empty Response';

export function qaPrompt(question: string, context: string): string {
  return `Context information is below.
---------------------
${context}
---------------------
Given the context information and not prior knowledge, answer the query.
Query: ${question}
Answer: `;
}

export function refinePrompt(question: string, existingAnswer: string, context: string): string {
  return `The original query is as follows: ${question}
We have provided an existing answer: ${existingAnswer}
We have the opportunity to refine the existing answer (only if needed) with some more context below.
------------
${context}
------------
Given the new context, refine the original answer to better answer the query.
If the context isn't useful, return the original answer.
Refined Answer: `;
}

export function summaryPrompt(question: string, context: string): string {
  return `Context information from multiple sources is below.
---------------------
${context}
---------------------
Given the information from multiple sources and not prior knowledge, answer the query.
Query: ${question}
Answer: `;
}

/**
 * Render a retrieved chunk with its source so version differences stay attributable.
 */
export function formatChunk(doc: Document): string {
  const fileName = doc.metadata.file_name;
  if (typeof fileName !== 'string') {
    return doc.pageContent;
  }
  const page = doc.metadata.page_number;
  const pageSuffix = typeof page === 'number' ? ` (page ${page})` : '';
  return `Source: ${fileName}${pageSuffix}\n${doc.pageContent}`;
}
