import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import {
  GetHeadlinesUseCase,
  HeadlinesResult,
} from '../../application/use-cases/get-headlines.use-case';
import { SearchNewsUseCase } from '../../application/use-cases/search-news.use-case';
import {
  HeadlinesQueryDto,
  HeadlinesResponseDto,
  NewsSearchRequestDto,
  NewsSearchResponseDto,
} from './dto/news.dto';

@ApiTags('news')
@Controller('api/v1/news')
export class NewsController {
  constructor(
    private readonly searchNews: SearchNewsUseCase,
    private readonly getHeadlines: GetHeadlinesUseCase,
  ) {}

  @Post('search')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Semantic search over stored articles' })
  @ApiOkResponse({ type: NewsSearchResponseDto })
  async search(@Body() body: NewsSearchRequestDto): Promise<NewsSearchResponseDto> {
    const results = await this.searchNews.execute(body.query, body.limit);
    return { results };
  }

  @Get('headlines')
  @ApiOperation({ summary: "Today's top headlines, cached per country and category" })
  @ApiOkResponse({ type: HeadlinesResponseDto })
  async headlines(@Query() query: HeadlinesQueryDto): Promise<HeadlinesResult> {
    return this.getHeadlines.execute(
      (query.country || 'us').toLowerCase(),
      query.category?.toLowerCase() || undefined,
    );
  }
}
