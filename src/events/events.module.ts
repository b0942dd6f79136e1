import { Module } from '@nestjs/common';
import { EventsService } from './events.service';
import { AwsModule } from '../aws/aws.module';
import { ConfigModule } from '@nestjs/config';

@Module({
  imports: [AwsModule, ConfigModule],
  providers: [EventsService],
  exports: [EventsService],
})
export class EventsModule {}
