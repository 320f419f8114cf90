import { Test, TestingModule } from '@nestjs/testing';
import { Registry } from 'prom-client';
import { PromptAssembler } from '../../domain/services/prompt-assembler.service';
import { LOGGER } from '../../infrastructure/logging/shared/logger.port';
import { ServiceMetrics } from '../../infrastructure/metrics/service-metrics';
import { createMockLogger } from '../../../test/fakes/mock-logger';
import { LLM_CLIENT, VECTOR_STORE } from '../ports';
import { ILlmClient } from '../ports/llm-client.port';
import { IVectorStore } from '../ports/vector-store.port';
import { ChatUseCase } from './chat.use-case';

describe('ChatUseCase', () => {
  let useCase: ChatUseCase;
  let vectorStore: jest.Mocked<Pick<IVectorStore, 'search'>>;
  let llm: jest.Mocked<ILlmClient>;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(async () => {
    vectorStore = { search: jest.fn().mockResolvedValue([]) };
    llm = { generate: jest.fn().mockResolvedValue('A reply.') };
    logger = createMockLogger();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatUseCase,
        PromptAssembler,
        { provide: VECTOR_STORE, useValue: vectorStore },
        { provide: LLM_CLIENT, useValue: llm },
        { provide: LOGGER, useValue: logger },
        { provide: ServiceMetrics, useValue: new ServiceMetrics(new Registry()) },
      ],
    }).compile();
    useCase = module.get(ChatUseCase);
  });

  it('answers a plain message without a similarity lookup', async () => {
    await expect(useCase.execute({ content: 'Hello' }, 'http')).resolves.toEqual({
      type: 'bot_response',
      content: 'A reply.',
    });
    expect(vectorStore.search).not.toHaveBeenCalled();
    expect(llm.generate).toHaveBeenCalledWith('User message:\nHello\n');
  });

  it('adds the 20 nearest records as context for a selected article', async () => {
    vectorStore.search.mockResolvedValueOnce([
      { id: 'news_1', score: 0.9, fields: { text: 'Full text one' } },
      { id: 'news_2', score: 0.8, fields: { title: 'Two', summary: 'Second story' } },
    ]);

    await useCase.execute(
      { content: 'Why?', chatHistory: ['user: hi', 'bot: hello'], selectedArticle: 'Rates hold' },
      'websocket',
    );

    expect(vectorStore.search).toHaveBeenCalledWith('Rates hold', 20);
    expect(llm.generate).toHaveBeenCalledWith(
      'Chat history:\nuser: hi\nbot: hello\n' +
        'Selected article:\nRates hold\n' +
        'Similar articles:\nFull text one\nTwo\nSecond story\n' +
        'User message:\nWhy?\n',
    );
  });

  it('continues without similar articles when the lookup fails', async () => {
    vectorStore.search.mockRejectedValueOnce(new Error('index unavailable'));

    await useCase.execute({ content: 'Q', selectedArticle: 'S' }, 'http');

    expect(llm.generate).toHaveBeenCalledWith('Selected article:\nS\nUser message:\nQ\n');
    expect(logger.warn).toHaveBeenCalledWith(
      'Similar article lookup failed, continuing without context: index unavailable',
      'ChatUseCase',
    );
  });

  it('drops similar articles that do not fit the token budget', async () => {
    vectorStore.search.mockResolvedValueOnce([
      { id: 'a', score: 0.9, fields: { text: 'a'.repeat(40) } },
      { id: 'b', score: 0.8, fields: { text: 'b'.repeat(40) } },
    ]);

    await useCase.execute({ content: 'Q', selectedArticle: 'S', tokenBudget: 23 }, 'http');

    expect(llm.generate).toHaveBeenCalledWith(
      `Selected article:\nS\nSimilar articles:\n${'a'.repeat(40)}\nUser message:\nQ\n`,
    );
    expect(logger.info).toHaveBeenCalledWith(
      'Dropped 1 similar articles to fit the token budget',
      'ChatUseCase',
      { estimatedTokens: 23 },
    );
  });

  it('propagates LLM failures', async () => {
    llm.generate.mockRejectedValueOnce(new Error('Gemini API error: quota'));
    await expect(useCase.execute({ content: 'Q' }, 'http')).rejects.toThrow(
      'Gemini API error: quota',
    );
  });
});
