import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GenerativeModel, GoogleGenerativeAI } from '@google/generative-ai';
import { ILlmClient } from '../../application/ports/llm-client.port';
import { GeminiConfig } from '../../config/gemini.config';
import {
  ConfigurationError,
  getErrorInfo,
  UpstreamServiceError,
} from '../../domain/errors';
import { ILoggerPort, LOGGER } from '../logging/shared/logger.port';

@Injectable()
export class GeminiLlmAdapter implements ILlmClient {
  private model?: GenerativeModel;

  constructor(
    private readonly config: ConfigService,
    @Inject(LOGGER) private readonly logger: ILoggerPort,
  ) {}

  async generate(prompt: string): Promise<string> {
    const model = this.getModel();
    try {
      const result = await model.generateContent(prompt);
      return result.response.text();
    } catch (error) {
      const message = `Gemini API error: ${getErrorInfo(error).message}`;
      this.logger.error(message, error, 'GeminiLlmAdapter');
      throw new UpstreamServiceError('gemini', message, error);
    }
  }

  private getModel(): GenerativeModel {
    if (this.model) return this.model;
    const { apiKey, model } = this.config.getOrThrow<GeminiConfig>('gemini');
    if (!apiKey) {
      throw new ConfigurationError('Gemini is not configured: GEMINI_API_KEY is required');
    }
    this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model });
    return this.model;
  }
}
