import { BedrockRuntimeClient, ConverseCommand } from '@aws-sdk/client-bedrock-runtime';
import { LlmServiceError } from '../middleware/errorHandler';
import logger from '../utils/logger';
import { buildEntityExtractionPrompt } from './prompts/entity-extraction.prompt';

/**
 * Text-to-text call that turns page text into the model's raw answer.
 * The answer is expected to contain one JSON object; parsing is the caller's job.
 */
export interface IFieldExtractor {
  extractFields(websiteText: string, url: string): Promise<string>;
}

export interface BedrockFieldExtractorOptions {
  modelId: string;
  maxTokens: number;
  temperature?: number;
}

/**
 * Field extractor backed by the AWS Bedrock Converse API
 */
export class BedrockFieldExtractor implements IFieldExtractor {
  constructor(
    private readonly client: BedrockRuntimeClient,
    private readonly options: BedrockFieldExtractorOptions
  ) {}

  async extractFields(websiteText: string, url: string): Promise<string> {
    const prompt = buildEntityExtractionPrompt(websiteText, url);

    try {
      logger.debug(`Sending extraction request to AWS Bedrock (${this.options.modelId}) with ${websiteText.length} chars`);

      const response = await this.client.send(new ConverseCommand({
        modelId: this.options.modelId,
        messages: [{ role: 'user', content: [{ text: prompt }] }],
        inferenceConfig: {
          maxTokens: this.options.maxTokens,
          temperature: this.options.temperature ?? 0,
        },
      }));

      const text = (response.output?.message?.content ?? [])
        .map(block => block.text ?? '')
        .join('');

      logger.debug(`AWS Bedrock answered with ${text.length} chars (stop reason: ${response.stopReason ?? 'unknown'})`);
      return text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`AWS Bedrock extraction request failed: ${message}`);
      throw new LlmServiceError(`LLM processing error: ${message}`);
    }
  }
}
