import { Module } from '@nestjs/common';
import { StoreAuthService } from '../auth/store-auth.service';
import { DatastoreModule } from '../datastore/datastore.module';
import { FileService } from './file.service';
import { RetrievalController } from './retrieval.controller';
import { SubRetrievalController } from './sub-retrieval.controller';

@Module({
  imports: [DatastoreModule],
  controllers: [RetrievalController, SubRetrievalController],
  providers: [StoreAuthService, FileService],
})
export class RetrievalModule {}
