import { Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PutCommand } from '@aws-sdk/lib-dynamodb';
import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { DynamoDbService } from '../../aws/dynamodb/dynamodb.service';
import { SeedDataDto } from './dto/seed-data.dto';

export interface SeedSummary {
  created: number;
  skipped: number;
}

/**
 * Loads sample users and events for local development. Existing records
 * are left untouched.
 */
@Injectable()
export class SeedService {
  private readonly logger = new Logger(SeedService.name);
  private readonly usersTable: string;
  private readonly eventsTable: string;

  constructor(
    private readonly dynamoDbService: DynamoDbService,
    private readonly configService: ConfigService,
  ) {
    const usersTable = this.configService.get<string>('DYNAMODB_TABLE_USERS');
    const eventsTable = this.configService.get<string>('DYNAMODB_TABLE_EVENTS');
    if (!usersTable || !eventsTable) {
      throw new InternalServerErrorException(
        'DYNAMODB_TABLE_USERS and DYNAMODB_TABLE_EVENTS must be defined',
      );
    }
    this.usersTable = usersTable;
    this.eventsTable = eventsTable;
  }

  async parse(raw: unknown): Promise<SeedDataDto> {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new Error('Seed data must be an object with users and events');
    }

    const data = plainToInstance(SeedDataDto, raw);
    const errors = await validate(data);
    if (errors.length > 0) {
      const details = errors.map((error) => error.toString()).join('');
      throw new Error(`Invalid seed data:\n${details}`);
    }
    return data;
  }

  async seed(data: SeedDataDto): Promise<SeedSummary> {
    const summary: SeedSummary = { created: 0, skipped: 0 };
    const now = new Date().toISOString();

    for (const user of data.users) {
      const created = await this.putIfAbsent(
        this.usersTable,
        { ...user, createdAt: now, updatedAt: now },
        'userId',
      );
      summary[created ? 'created' : 'skipped']++;
    }

    for (const event of data.events) {
      const created = await this.putIfAbsent(
        this.eventsTable,
        { ...event },
        'eventId',
      );
      summary[created ? 'created' : 'skipped']++;
    }

    this.logger.log(
      `Seeding finished: ${summary.created} created, ${summary.skipped} already present`,
    );
    return summary;
  }

  private async putIfAbsent(
    tableName: string,
    item: Record<string, unknown>,
    keyAttribute: string,
  ): Promise<boolean> {
    const command = new PutCommand({
      TableName: tableName,
      Item: item,
      ConditionExpression: 'attribute_not_exists(#key)',
      ExpressionAttributeNames: { '#key': keyAttribute },
    });

    try {
      await this.dynamoDbService.docClient.send(command);
      this.logger.log(`Created ${keyAttribute} ${String(item[keyAttribute])} in ${tableName}`);
      return true;
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        this.logger.warn(
          `${keyAttribute} ${String(item[keyAttribute])} already exists in ${tableName}`,
        );
        return false;
      }
      throw error;
    }
  }
}
