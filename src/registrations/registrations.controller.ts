import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Logger,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import {
  ApiBody,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { RegistrationsService } from './registrations.service';
import { CreateRegistrationDto } from './dto/create-registration.dto';
import {
  CancelRegistrationResponseDto,
  RegistrationResponseDto,
} from './dto/registration-response.dto';
import { ListRegistrationsQueryDto } from './dto/find-registrations-query.dto';
import { Registration } from './interfaces/registration.interface';

const toResponse = (registration: Registration) =>
  new RegistrationResponseDto(registration);

@ApiTags('registrations')
@Controller()
export class RegistrationsController {
  private readonly logger = new Logger(RegistrationsController.name);

  constructor(private readonly registrationsService: RegistrationsService) {}

  @Post('registrations')
  @HttpCode(201)
  @ApiOperation({
    summary: 'Create a registration',
    description:
      'Registers a user for an event. The registration is confirmed while seats remain, waitlisted when the event is full and has a waitlist, and refused otherwise.',
  })
  @ApiBody({ type: CreateRegistrationDto })
  @ApiResponse({ status: 201, description: 'Registration confirmed or waitlisted.', type: RegistrationResponseDto })
  @ApiResponse({ status: 404, description: 'User or event not found.' })
  @ApiResponse({ status: 409, description: 'Already registered, or event full without a waitlist.' })
  @ApiResponse({ status: 422, description: 'Invalid input data.' })
  @ApiResponse({ status: 500, description: 'Concurrent updates exhausted the retries, or the store failed.' })
  async createRegistration(
    @Body() createRegistrationDto: CreateRegistrationDto,
  ): Promise<RegistrationResponseDto> {
    const { userId, eventId } = createRegistrationDto;
    this.logger.log(`User ${userId} is attempting to register for event ${eventId}`);

    const registration = await this.registrationsService.register(userId, eventId);
    return toResponse(registration);
  }

  @Delete('registrations/:eventId/users/:userId')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Cancel a registration',
    description:
      'Removes the registration. If it held a seat, the earliest waitlisted registration is promoted into it.',
  })
  @ApiParam({ name: 'eventId', description: 'The ID of the event.' })
  @ApiParam({ name: 'userId', description: 'The ID of the user.' })
  @ApiResponse({ status: 200, description: 'Registration cancelled.', type: CancelRegistrationResponseDto })
  @ApiResponse({ status: 404, description: 'Registration not found.' })
  @ApiResponse({ status: 500, description: 'Concurrent updates exhausted the retries, or the store failed.' })
  async cancelRegistration(
    @Param('eventId') eventId: string,
    @Param('userId') userId: string,
  ): Promise<CancelRegistrationResponseDto> {
    this.logger.log(
      `User ${userId} is attempting to cancel registration for event ${eventId}`,
    );

    const { cancelled, promoted } = await this.registrationsService.cancel(
      userId,
      eventId,
    );

    return new CancelRegistrationResponseDto({
      message: 'Registration cancelled successfully',
      previousStatus: cancelled.status,
      promoted: promoted ? toResponse(promoted) : undefined,
    });
  }

  @Get('users/:userId/registrations')
  @HttpCode(200)
  @ApiOperation({ summary: 'List the registrations of a user' })
  @ApiParam({ name: 'userId', description: 'The ID of the user.' })
  @ApiResponse({ status: 200, type: [RegistrationResponseDto] })
  @ApiResponse({ status: 404, description: 'User not found.' })
  async findUserRegistrations(
    @Param('userId') userId: string,
    @Query() query: ListRegistrationsQueryDto,
  ): Promise<RegistrationResponseDto[]> {
    const registrations = await this.registrationsService.listForUser(
      userId,
      query.status,
    );
    return registrations.map(toResponse);
  }

  @Get('events/:eventId/registrations')
  @HttpCode(200)
  @ApiOperation({
    summary: 'List the registrations of an event',
    description: 'Registrations are returned in registration order.',
  })
  @ApiParam({ name: 'eventId', description: 'The ID of the event.' })
  @ApiResponse({ status: 200, type: [RegistrationResponseDto] })
  @ApiResponse({ status: 404, description: 'Event not found.' })
  async findEventRegistrations(
    @Param('eventId') eventId: string,
    @Query() query: ListRegistrationsQueryDto,
  ): Promise<RegistrationResponseDto[]> {
    const registrations = await this.registrationsService.listForEvent(
      eventId,
      query.status,
    );
    return registrations.map(toResponse);
  }
}
