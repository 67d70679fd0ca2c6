import { Module } from '@nestjs/common';
import { HandbookModule } from '../../modules/handbook/handbook.module';
import { OpenWebuiController } from './open-webui.controller';
import { OpenWebuiService } from './open-webui.service';

@Module({
  imports: [HandbookModule],
  controllers: [OpenWebuiController],
  providers: [OpenWebuiService],
})
export class OpenWebuiModule {}
