import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class CreateRegistrationDto {
  @ApiProperty({
    description: 'The ID of the user registering for the event.',
    example: 'user-123',
    maxLength: 128,
  })
  @IsNotEmpty()
  @IsString()
  @MaxLength(128, { message: 'User ID cannot be longer than 128 characters.' })
  userId!: string;

  @ApiProperty({
    description: 'The ID of the event to register for.',
    example: 'tech-conference-2026',
    maxLength: 128,
  })
  @IsNotEmpty()
  @IsString()
  @MaxLength(128, { message: 'Event ID cannot be longer than 128 characters.' })
  eventId!: string;
}
