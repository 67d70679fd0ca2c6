import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AzureKeyCredential, SearchClient } from '@azure/search-documents';
import { AppConfig } from '../../config/configuration';
import { AzureOpenAiModule } from '../../shared/llm/azure-openai.module';
import { HandbookController } from './handbook.controller';
import { HandbookService } from './handbook.service';
import { HandbookDocument } from './interfaces/search.interface';
import { SEARCH_CLIENT, SearchService } from './utils/search.service';

@Module({
  imports: [AzureOpenAiModule],
  controllers: [HandbookController],
  providers: [
    HandbookService,
    SearchService,
    {
      provide: SEARCH_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) => {
        const { endpoint, indexName, key } = config.get('search', {
          infer: true,
        });
        return new SearchClient<HandbookDocument>(
          endpoint,
          indexName,
          new AzureKeyCredential(key),
        );
      },
    },
  ],
  exports: [HandbookService],
})
export class HandbookModule {}
