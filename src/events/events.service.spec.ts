import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { GetCommand } from '@aws-sdk/lib-dynamodb';
import { InternalServerErrorException, Logger } from '@nestjs/common';
import { EventsService } from './events.service';
import { DynamoDbService } from '../aws/dynamodb/dynamodb.service';
import { EventStatus } from './enums/event-status.enum';
import { Event } from './interfaces/event.interface';

describe('EventsService', () => {
  let service: EventsService;

  const mockDynamoDbService = {
    docClient: {
      send: jest.fn(),
    },
  };

  const mockConfigService = {
    get: jest.fn().mockReturnValue('test-events-table'),
  };

  const mockEvent: Event = {
    eventId: 'event-1',
    title: 'Community Meetup',
    description: 'Monthly meetup',
    date: '2026-12-15',
    location: 'Main Hall',
    capacity: 2,
    organizer: 'Events Team',
    status: EventStatus.ACTIVE,
    hasWaitlist: true,
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => {});

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EventsService,
        { provide: DynamoDbService, useValue: mockDynamoDbService },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<EventsService>(EventsService);
  });

  it('should throw when the events table is not configured', () => {
    const config = { get: jest.fn().mockReturnValue(undefined) };
    expect(
      () =>
        new EventsService(
          mockDynamoDbService as unknown as DynamoDbService,
          config as unknown as ConfigService,
        ),
    ).toThrow(InternalServerErrorException);
  });

  describe('findEventById', () => {
    it('should return the event when found', async () => {
      mockDynamoDbService.docClient.send.mockResolvedValueOnce({ Item: mockEvent });

      const result = await service.findEventById('event-1');

      expect(result).toEqual(mockEvent);
      const command = mockDynamoDbService.docClient.send.mock.calls[0][0];
      expect(command).toBeInstanceOf(GetCommand);
      expect(command.input).toEqual({
        TableName: 'test-events-table',
        Key: { eventId: 'event-1' },
      });
    });

    it('should return null when not found', async () => {
      mockDynamoDbService.docClient.send.mockResolvedValueOnce({});
      await expect(service.findEventById('missing')).resolves.toBeNull();
    });

    it('should throw InternalServerErrorException on DynamoDB error', async () => {
      mockDynamoDbService.docClient.send.mockRejectedValueOnce(new Error('fail'));
      await expect(service.findEventById('event-1')).rejects.toThrow(
        InternalServerErrorException,
      );
    });
  });

  describe('findEventCapacity', () => {
    it('should return capacity and waitlist flag', async () => {
      mockDynamoDbService.docClient.send.mockResolvedValueOnce({ Item: mockEvent });

      await expect(service.findEventCapacity('event-1')).resolves.toEqual({
        eventId: 'event-1',
        capacity: 2,
        hasWaitlist: true,
      });
    });

    it('should treat a missing waitlist flag as disabled', async () => {
      const { hasWaitlist: _, ...withoutFlag } = mockEvent;
      mockDynamoDbService.docClient.send.mockResolvedValueOnce({ Item: withoutFlag });

      const result = await service.findEventCapacity('event-1');

      expect(result?.hasWaitlist).toBe(false);
    });

    it('should return null when the event does not exist', async () => {
      mockDynamoDbService.docClient.send.mockResolvedValueOnce({});
      await expect(service.findEventCapacity('missing')).resolves.toBeNull();
    });

    it('should reject a stored capacity that is not a positive integer', async () => {
      mockDynamoDbService.docClient.send.mockResolvedValueOnce({
        Item: { ...mockEvent, capacity: 0 },
      });
      await expect(service.findEventCapacity('event-1')).rejects.toThrow(
        'Event has an invalid capacity',
      );
    });
  });
});
