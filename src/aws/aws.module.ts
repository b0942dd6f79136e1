import { Module } from '@nestjs/common';
import { DynamoDbService } from './dynamodb/dynamodb.service';

@Module({
  providers: [DynamoDbService],
  exports: [DynamoDbService],
})
export class AwsModule {}
