import { Exclude, Expose, Type } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';
import { RegistrationStatus } from '../enums/registration-status.enum';

@Exclude()
export class RegistrationResponseDto {
  @ApiProperty({
    description: 'The ID of the registration.',
    example: '123e4567-e89b-12d3-a456-426614174000',
    format: 'uuid',
  })
  @Expose()
  id!: string;

  @ApiProperty({ description: 'The ID of the user.', example: 'user-123' })
  @Expose()
  userId!: string;

  @ApiProperty({
    description: 'The ID of the event.',
    example: 'tech-conference-2026',
  })
  @Expose()
  eventId!: string;

  @ApiProperty({
    description: 'Whether the registration holds a seat or waits for one.',
    enum: RegistrationStatus,
    example: RegistrationStatus.CONFIRMED,
  })
  @Expose()
  status!: RegistrationStatus;

  @ApiProperty({
    description:
      'Position key within the event. Waitlisted registrations are promoted in ascending order.',
    example: 42,
  })
  @Expose()
  registeredAt!: number;

  @ApiProperty({
    description: 'The date when the registration was created.',
    example: '2026-10-01T12:00:00.000Z',
    type: String,
  })
  @Expose()
  createdAt!: string;

  @ApiProperty({
    description: 'The date when the registration was last updated.',
    example: '2026-10-01T12:00:00.000Z',
    type: String,
  })
  @Expose()
  updatedAt!: string;

  constructor(partial: Partial<RegistrationResponseDto>) {
    Object.assign(this, partial);
  }
}

@Exclude()
export class CancelRegistrationResponseDto {
  @ApiProperty({ example: 'Registration cancelled successfully' })
  @Expose()
  message!: string;

  @ApiProperty({
    description: 'Status the registration had when it was cancelled.',
    enum: RegistrationStatus,
  })
  @Expose()
  previousStatus!: RegistrationStatus;

  @ApiProperty({
    description: 'The waitlisted registration promoted into the released seat, if any.',
    type: () => RegistrationResponseDto,
    required: false,
  })
  @Expose()
  @Type(() => RegistrationResponseDto)
  promoted?: RegistrationResponseDto;

  constructor(partial: Partial<CancelRegistrationResponseDto>) {
    Object.assign(this, partial);
  }
}
