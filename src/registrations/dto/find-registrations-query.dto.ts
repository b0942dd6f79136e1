import { IsEnum, IsOptional } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { RegistrationStatus } from '../enums/registration-status.enum';

export class ListRegistrationsQueryDto {
  @ApiProperty({
    description: 'Only return registrations with this status.',
    enum: RegistrationStatus,
    required: false,
  })
  @IsOptional()
  @IsEnum(RegistrationStatus, {
    message: 'Status must be one of: confirmed, waitlisted.',
  })
  status?: RegistrationStatus;
}
