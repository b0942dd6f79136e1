import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RegistrationsController } from './registrations.controller';
import { RegistrationsService } from './registrations.service';
import { PromotionCoordinator } from './promotion-coordinator.service';
import { RegistrationLedger } from './registration-ledger';
import { DynamoDbRegistrationLedger } from './dynamodb-registration-ledger.service';
import { AwsModule } from '../aws/aws.module';
import { UsersModule } from '../users/users.module';
import { EventsModule } from '../events/events.module';

@Module({
  imports: [AwsModule, ConfigModule, UsersModule, EventsModule],
  controllers: [RegistrationsController],
  providers: [
    RegistrationsService,
    PromotionCoordinator,
    { provide: RegistrationLedger, useClass: DynamoDbRegistrationLedger },
  ],
  exports: [RegistrationsService],
})
export class RegistrationsModule {}
