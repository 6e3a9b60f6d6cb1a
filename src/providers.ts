/**
 * Chat model and embedding factories for each provider family.
 */
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import {
  AzureChatOpenAI,
  AzureOpenAIEmbeddings,
  ChatOpenAI,
  OpenAIEmbeddings,
} from '@langchain/openai';
import type { ModelConfiguration } from './config.js';
import { ConfigurationError } from './errors.js';

// OpenAI-compatible local servers accept any key.
const LOCAL_SERVER_API_KEY = 'local';

interface AzureSettings {
  azureOpenAIApiKey: string;
  azureOpenAIEndpoint: string;
  azureOpenAIApiVersion: string;
}

function openAIKey(config: ModelConfiguration, env: NodeJS.ProcessEnv): string {
  const apiKey = env.OPENAI_API_KEY;
  if (apiKey) {
    return apiKey;
  }
  if (config.apiBase) {
    return LOCAL_SERVER_API_KEY;
  }
  throw new ConfigurationError(
    `OPENAI_API_KEY not found (required by model configuration '${config.name}'). ` +
      'Create a .env file with your API key; see .env.example for the format.'
  );
}

function azureSettings(config: ModelConfiguration, env: NodeJS.ProcessEnv): AzureSettings {
  const apiKey = env.AZURE_OPENAI_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError(
      `AZURE_OPENAI_API_KEY not found (required by model configuration '${config.name}').`
    );
  }
  const endpoint = config.apiBase ?? env.AZURE_OPENAI_ENDPOINT;
  if (!endpoint) {
    throw new ConfigurationError(
      `No Azure OpenAI endpoint for model configuration '${config.name}'. Set AZURE_OPENAI_ENDPOINT.`
    );
  }
  return {
    azureOpenAIApiKey: apiKey,
    azureOpenAIEndpoint: endpoint,
    azureOpenAIApiVersion: config.apiVersion ?? '2024-02-15-preview',
  };
}

export function createChatModel(
  config: ModelConfiguration,
  env: NodeJS.ProcessEnv = process.env
): BaseChatModel {
  if (config.provider === 'managed_api') {
    return new AzureChatOpenAI({
      ...azureSettings(config, env),
      azureOpenAIApiDeploymentName: config.llmModel,
      temperature: 0,
    });
  }

  return new ChatOpenAI({
    model: config.llmModel,
    apiKey: openAIKey(config, env),
    temperature: 0,
    configuration: config.apiBase ? { baseURL: config.apiBase } : undefined,
  });
}

export function createEmbeddings(
  config: ModelConfiguration,
  env: NodeJS.ProcessEnv = process.env
): EmbeddingsInterface {
  if (config.provider === 'managed_api') {
    return new AzureOpenAIEmbeddings({
      ...azureSettings(config, env),
      azureOpenAIApiDeploymentName: config.embeddingModel,
    });
  }

  return new OpenAIEmbeddings({
    model: config.embeddingModel,
    apiKey: openAIKey(config, env),
    configuration: config.apiBase ? { baseURL: config.apiBase } : undefined,
  });
}
