import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  Post,
} from '@nestjs/common';
import { HandbookService } from './handbook.service';
import { HandbookAnswer } from '../../shared/interfaces/response.interface';

@Controller('handbook')
export class HandbookController {
  constructor(private readonly service: HandbookService) {}

  @Post('ask')
  @HttpCode(200)
  async ask(
    @Body('question') question: unknown,
    @Body('top') top: unknown,
  ): Promise<HandbookAnswer> {
    if (typeof question !== 'string' || !question.trim()) {
      throw new BadRequestException('question must be a non-empty string');
    }
    if (top === undefined) {
      return this.service.handleQuery(question);
    }
    if (typeof top !== 'number' || !Number.isInteger(top) || top < 1) {
      throw new BadRequestException('top must be a positive integer');
    }
    return this.service.handleQuery(question, top);
  }
}
