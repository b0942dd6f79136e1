import { GetCommand } from '@aws-sdk/lib-dynamodb';
import {
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DynamoDbService } from '../aws/dynamodb/dynamodb.service';
import { Event, EventCapacity } from './interfaces/event.interface';

@Injectable()
export class EventsService {
  private readonly logger = new Logger(EventsService.name);
  private readonly eventsTable: string;

  constructor(
    private readonly dynamoDBService: DynamoDbService,
    private readonly configService: ConfigService,
  ) {
    const tableName = this.configService.get<string>('DYNAMODB_TABLE_EVENTS');
    if (!tableName) {
      this.logger.error('DYNAMODB_TABLE_EVENTS is not defined');
      throw new InternalServerErrorException(
        'DYNAMODB_TABLE_EVENTS not defined in environment variables',
      );
    }
    this.eventsTable = tableName;
  }

  async findEventById(eventId: string): Promise<Event | null> {
    const command = new GetCommand({
      TableName: this.eventsTable,
      Key: { eventId },
    });

    try {
      const response = await this.dynamoDBService.docClient.send(command);
      if (!response.Item) {
        return null;
      }

      return response.Item as Event;
    } catch (error) {
      this.logger.error(
        `Error finding event ${eventId}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new InternalServerErrorException('Error finding event');
    }
  }

  /**
   * Reads the capacity settings of an event fresh from the store. Records
   * written before waitlisting existed carry no `hasWaitlist` and are
   * treated as having none.
   */
  async findEventCapacity(eventId: string): Promise<EventCapacity | null> {
    const event = await this.findEventById(eventId);
    if (!event) {
      return null;
    }

    const capacity = Number(event.capacity);
    if (!Number.isInteger(capacity) || capacity <= 0) {
      this.logger.error(
        `Event ${eventId} has an invalid capacity: ${event.capacity}`,
      );
      throw new InternalServerErrorException('Event has an invalid capacity');
    }

    return {
      eventId: event.eventId,
      capacity,
      hasWaitlist: event.hasWaitlist === true,
    };
  }
}
