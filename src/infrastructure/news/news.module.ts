import { Module } from '@nestjs/common';
import { ArticlePreparationService } from '../../application/services/article-preparation.service';
import { ChatUseCase } from '../../application/use-cases/chat.use-case';
import { GetHeadlinesUseCase } from '../../application/use-cases/get-headlines.use-case';
import { SearchNewsUseCase } from '../../application/use-cases/search-news.use-case';
import { PromptAssembler } from '../../domain/services/prompt-assembler.service';
import { AdaptersModule } from '../adapters/adapters.module';
import { CacheModule } from '../cache/cache.module';
import { ChatController } from '../controllers/chat.controller';
import { NewsController } from '../controllers/news.controller';
import { ChatSocketServer } from '../ws/chat-socket.server';

@Module({
  imports: [AdaptersModule, CacheModule],
  controllers: [NewsController, ChatController],
  providers: [
    ArticlePreparationService,
    PromptAssembler,
    SearchNewsUseCase,
    GetHeadlinesUseCase,
    ChatUseCase,
    ChatSocketServer,
  ],
  exports: [ChatSocketServer],
})
export class NewsModule {}
