import { Module } from '@nestjs/common';
import { AppConfigModule } from './config/app-config.module';
import { RetrievalModule } from './retrieval/retrieval.module';

@Module({
  imports: [AppConfigModule, RetrievalModule],
})
export class AppModule {}
