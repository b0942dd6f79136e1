import { Test, TestingModule } from '@nestjs/testing';
import { HttpStatus, Logger, NotFoundException } from '@nestjs/common';
import { plainToInstance, instanceToPlain } from 'class-transformer';
import { validate } from 'class-validator';
import { RegistrationsController } from './registrations.controller';
import { RegistrationsService } from './registrations.service';
import { CreateRegistrationDto } from './dto/create-registration.dto';
import { ListRegistrationsQueryDto } from './dto/find-registrations-query.dto';
import { RegistrationResponseDto } from './dto/registration-response.dto';
import { RegistrationStatus } from './enums/registration-status.enum';
import { Registration } from './interfaces/registration.interface';
import {
  CapacityExceededException,
  DuplicateRegistrationException,
  RegistrationStoreException,
  TransientConflictException,
} from './exceptions/registration.exceptions';

describe('RegistrationsController', () => {
  let controller: RegistrationsController;

  const mockRegistrationsService = {
    register: jest.fn(),
    cancel: jest.fn(),
    listForUser: jest.fn(),
    listForEvent: jest.fn(),
  };

  const waitlisted: Registration = {
    id: 'reg-2',
    userId: 'user-2',
    eventId: 'event-1',
    status: RegistrationStatus.WAITLISTED,
    registeredAt: 2,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
  };

  const confirmed: Registration = {
    id: 'reg-1',
    userId: 'user-1',
    eventId: 'event-1',
    status: RegistrationStatus.CONFIRMED,
    registeredAt: 1,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => {});

    const module: TestingModule = await Test.createTestingModule({
      controllers: [RegistrationsController],
      providers: [
        { provide: RegistrationsService, useValue: mockRegistrationsService },
      ],
    }).compile();

    controller = module.get<RegistrationsController>(RegistrationsController);
  });

  describe('createRegistration', () => {
    it('should return the registration as a response DTO', async () => {
      mockRegistrationsService.register.mockResolvedValue(waitlisted);

      const result = await controller.createRegistration({
        userId: 'user-2',
        eventId: 'event-1',
      });

      expect(mockRegistrationsService.register).toHaveBeenCalledWith(
        'user-2',
        'event-1',
      );
      expect(result).toBeInstanceOf(RegistrationResponseDto);
      expect(instanceToPlain(result)).toEqual({
        id: 'reg-2',
        userId: 'user-2',
        eventId: 'event-1',
        status: RegistrationStatus.WAITLISTED,
        registeredAt: 2,
        createdAt: '2026-01-01T00:00:00.000Z',
        updatedAt: '2026-01-01T00:00:00.000Z',
      });
    });

    it.each([
      [new NotFoundException('Event not found'), HttpStatus.NOT_FOUND],
      [new DuplicateRegistrationException(), HttpStatus.CONFLICT],
      [new CapacityExceededException(), HttpStatus.CONFLICT],
      [
        new TransientConflictException('complete the registration'),
        HttpStatus.INTERNAL_SERVER_ERROR,
      ],
      [new RegistrationStoreException('Error'), HttpStatus.INTERNAL_SERVER_ERROR],
    ])('should surface %p with its HTTP status', async (error, status) => {
      mockRegistrationsService.register.mockRejectedValue(error);

      const attempt = controller.createRegistration({
        userId: 'user-1',
        eventId: 'event-1',
      });

      await expect(attempt).rejects.toBe(error);
      expect(error.getStatus()).toBe(status);
    });
  });

  describe('cancelRegistration', () => {
    it('should report the promoted registration', async () => {
      mockRegistrationsService.cancel.mockResolvedValue({
        cancelled: confirmed,
        promoted: { ...confirmed, id: 'reg-2', userId: 'user-2', registeredAt: 2 },
      });

      const result = await controller.cancelRegistration('event-1', 'user-1');

      expect(mockRegistrationsService.cancel).toHaveBeenCalledWith(
        'user-1',
        'event-1',
      );
      expect(result.message).toBe('Registration cancelled successfully');
      expect(result.previousStatus).toBe(RegistrationStatus.CONFIRMED);
      expect(result.promoted?.userId).toBe('user-2');
      expect(result.promoted?.status).toBe(RegistrationStatus.CONFIRMED);
    });

    it('should leave promoted out when no one moved up', async () => {
      mockRegistrationsService.cancel.mockResolvedValue({
        cancelled: waitlisted,
        promoted: null,
      });

      const result = await controller.cancelRegistration('event-1', 'user-2');

      expect(instanceToPlain(result)).toEqual({
        message: 'Registration cancelled successfully',
        previousStatus: RegistrationStatus.WAITLISTED,
      });
    });

    it('should propagate NotFoundException', async () => {
      mockRegistrationsService.cancel.mockRejectedValue(
        new NotFoundException('Registration not found'),
      );

      await expect(
        controller.cancelRegistration('event-1', 'user-9'),
      ).rejects.toThrow('Registration not found');
    });
  });

  describe('listing', () => {
    it('should list the registrations of a user with the status filter', async () => {
      mockRegistrationsService.listForUser.mockResolvedValue([waitlisted]);

      const result = await controller.findUserRegistrations('user-2', {
        status: RegistrationStatus.WAITLISTED,
      });

      expect(mockRegistrationsService.listForUser).toHaveBeenCalledWith(
        'user-2',
        RegistrationStatus.WAITLISTED,
      );
      expect(result).toHaveLength(1);
      expect(result[0]).toBeInstanceOf(RegistrationResponseDto);
    });

    it('should list the registrations of an event in the order given', async () => {
      mockRegistrationsService.listForEvent.mockResolvedValue([
        confirmed,
        waitlisted,
      ]);

      const result = await controller.findEventRegistrations('event-1', {});

      expect(mockRegistrationsService.listForEvent).toHaveBeenCalledWith(
        'event-1',
        undefined,
      );
      expect(result.map((r) => r.id)).toEqual(['reg-1', 'reg-2']);
    });
  });

  describe('validation', () => {
    it('should accept a well-formed registration request', async () => {
      const dto = plainToInstance(CreateRegistrationDto, {
        userId: 'user-1',
        eventId: 'event-1',
      });

      await expect(validate(dto)).resolves.toHaveLength(0);
    });

    it('should reject a missing or oversized identifier', async () => {
      const dto = plainToInstance(CreateRegistrationDto, {
        userId: '',
        eventId: 'e'.repeat(129),
      });

      const errors = await validate(dto);

      expect(errors.map((e) => e.property)).toEqual(['userId', 'eventId']);
      expect(errors[1].constraints).toEqual({
        maxLength: 'Event ID cannot be longer than 128 characters.',
      });
    });

    it('should reject an unknown status filter', async () => {
      const query = plainToInstance(ListRegistrationsQueryDto, {
        status: 'cancelled',
      });

      const errors = await validate(query);

      expect(errors).toHaveLength(1);
      expect(errors[0].constraints).toEqual({
        isEnum: 'Status must be one of: confirmed, waitlisted.',
      });
    });
  });
});
