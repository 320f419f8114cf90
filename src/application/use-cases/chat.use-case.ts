import { Inject, Injectable } from '@nestjs/common';
import { PromptAssembler } from '../../domain/services/prompt-assembler.service';
import { getErrorInfo } from '../../domain/errors';
import { ILoggerPort, LOGGER } from '../../infrastructure/logging/shared/logger.port';
import { ChatTransport, ServiceMetrics } from '../../infrastructure/metrics/service-metrics';
import { LLM_CLIENT, VECTOR_STORE } from '../ports';
import { ILlmClient } from '../ports/llm-client.port';
import { IVectorStore, VectorMatch } from '../ports/vector-store.port';

/** Records retrieved as context for a selected article. */
export const SIMILAR_ARTICLES_TOP_K = 20;

export interface ChatInput {
  content: string;
  chatHistory?: string[];
  selectedArticle?: string;
  tokenBudget?: number;
}

export interface BotResponse {
  type: 'bot_response';
  content: string;
}

const CONTEXT = 'ChatUseCase';

function textOf({ fields }: VectorMatch): string {
  const { text, title, summary } = fields;
  if (typeof text === 'string' && text) return text;
  return `${typeof title === 'string' ? title : ''}\n${typeof summary === 'string' ? summary : ''}`;
}

@Injectable()
export class ChatUseCase {
  constructor(
    @Inject(VECTOR_STORE) private readonly vectorStore: IVectorStore,
    @Inject(LLM_CLIENT) private readonly llm: ILlmClient,
    @Inject(LOGGER) private readonly logger: ILoggerPort,
    private readonly assembler: PromptAssembler,
    private readonly metrics: ServiceMetrics,
  ) {}

  async execute(input: ChatInput, transport: ChatTransport): Promise<BotResponse> {
    this.metrics.recordChatRequest(transport);
    const similarArticles = input.selectedArticle
      ? await this.findSimilar(input.selectedArticle)
      : [];

    const assembled = this.assembler.assemble({
      chatHistory: input.chatHistory ?? [],
      selectedArticle: input.selectedArticle,
      similarArticles,
      userMessage: input.content,
      tokenBudget: input.tokenBudget,
    });
    if (assembled.droppedArticles.length > 0) {
      this.logger.info(
        `Dropped ${assembled.droppedArticles.length} similar articles to fit the token budget`,
        CONTEXT,
        { estimatedTokens: assembled.estimatedTokens },
      );
    }

    const content = await this.llm.generate(assembled.prompt);
    return { type: 'bot_response', content };
  }

  private async findSimilar(selectedArticle: string): Promise<string[]> {
    try {
      const matches = await this.vectorStore.search(selectedArticle, SIMILAR_ARTICLES_TOP_K);
      return matches.map(textOf);
    } catch (error) {
      this.logger.warn(
        `Similar article lookup failed, continuing without context: ${getErrorInfo(error).message}`,
        CONTEXT,
      );
      return [];
    }
  }
}
