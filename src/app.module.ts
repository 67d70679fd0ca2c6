import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { HandbookModule } from './modules/handbook/handbook.module';
import { OpenWebuiModule } from './shared/open-webui/open-webui.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    HandbookModule,
    OpenWebuiModule,
  ],
})
export class AppModule {}
