import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsDateString,
  IsEmail,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { EventStatus } from '../../../events/enums/event-status.enum';

export class SeedUserDto {
  @IsNotEmpty()
  @IsString()
  userId!: string;

  @IsNotEmpty()
  @IsString()
  @MaxLength(70)
  name!: string;

  @IsEmail()
  email!: string;
}

export class SeedEventDto {
  @IsNotEmpty()
  @IsString()
  eventId!: string;

  @IsNotEmpty()
  @IsString()
  @MaxLength(200)
  title!: string;

  @IsNotEmpty()
  @IsString()
  @MaxLength(1000)
  description!: string;

  @IsDateString({}, { message: 'Date must be in ISO format or YYYY-MM-DD' })
  date!: string;

  @IsNotEmpty()
  @IsString()
  @MaxLength(200)
  location!: string;

  @IsInt()
  @Min(1)
  @Max(100000)
  capacity!: number;

  @IsNotEmpty()
  @IsString()
  @MaxLength(100)
  organizer!: string;

  @IsOptional()
  @IsEnum(EventStatus)
  status: EventStatus = EventStatus.ACTIVE;

  @IsOptional()
  @IsBoolean()
  hasWaitlist = false;
}

export class SeedDataDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SeedUserDto)
  users: SeedUserDto[] = [];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SeedEventDto)
  events: SeedEventDto[] = [];
}
