import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { UsersService } from './users.service';
import { AwsModule } from '../aws/aws.module';

@Module({
  imports: [AwsModule, ConfigModule],
  providers: [UsersService],
  exports: [UsersService],
})
export class UsersModule {}
