import { Body, Controller, Get, Param, Post, Res } from '@nestjs/common';
import {
  ChatCompletionRequest,
  CompletionSink,
} from './interfaces/open-webui.interface';
import { OpenWebuiService } from './open-webui.service';

@Controller('open-webui')
export class OpenWebuiController {
  constructor(private readonly openWebuiService: OpenWebuiService) {}

  @Get('v1/models')
  getModels() {
    return this.openWebuiService.getModels();
  }

  @Get('v1/models/:model')
  getModelInfo(@Param('model') model: string) {
    return this.openWebuiService.getModelInfo(model);
  }

  @Post('v1/chat/completions')
  async chatCompletions(
    @Body() body: ChatCompletionRequest,
    @Res() res: CompletionSink,
  ) {
    await this.openWebuiService.chatCompletions(body, res);
  }

  @Get('health')
  health() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }
}
