import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { AzureOpenAiService } from './azure-openai.service';

@Module({
  imports: [HttpModule],
  providers: [AzureOpenAiService],
  exports: [AzureOpenAiService],
})
export class AzureOpenAiModule {}
