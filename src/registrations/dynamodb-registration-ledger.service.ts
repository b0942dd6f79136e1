import {
  ConditionalCheckFailedException,
  CancellationReason,
  TransactionCanceledException,
} from '@aws-sdk/client-dynamodb';
import {
  GetCommand,
  QueryCommand,
  QueryCommandInput,
  TransactWriteCommand,
  TransactWriteCommandInput,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { unmarshall } from '@aws-sdk/util-dynamodb';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { DynamoDbService } from '../aws/dynamodb/dynamodb.service';
import { RegistrationStatus } from './enums/registration-status.enum';
import { Registration } from './interfaces/registration.interface';
import {
  CreateOutcome,
  DeleteOutcome,
  NewRegistration,
  PromoteOutcome,
  RegistrationLedger,
  ReleaseOutcome,
} from './registration-ledger';
import { RegistrationStoreException } from './exceptions/registration.exceptions';
import {
  REGISTRATIONS_BY_EVENT_INDEX,
  TALLY_ENTRY,
  WAITLIST_ENTRY_PREFIX,
  waitlistEntry,
} from './registration.constants';

type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

interface Tally {
  heldSeats: number;
  pendingPromotions: number;
  waitlistedCount: number;
}

const TALLY_NAMES = {
  '#held': 'heldSeats',
  '#pending': 'pendingPromotions',
  '#waitlisted': 'waitlistedCount',
};

function failedCondition(reason: CancellationReason | undefined): boolean {
  return reason?.Code === 'ConditionalCheckFailed';
}

function lostRace(reasons: CancellationReason[]): boolean {
  return reasons.some(
    (reason) =>
      reason.Code === 'ConditionalCheckFailed' ||
      reason.Code === 'TransactionConflict',
  );
}

/**
 * Registrations live in one table keyed by (userId, eventId). The tallies
 * table holds, per event, a tally item and one entry per waitlisted
 * registration keyed by its ordering key. Every write that changes a seat
 * or the waitlist updates the tally in the same transaction.
 */
@Injectable()
export class DynamoDbRegistrationLedger extends RegistrationLedger {
  private readonly logger = new Logger(DynamoDbRegistrationLedger.name);
  private readonly regTableName: string;
  private readonly talliesTableName: string;

  constructor(
    private readonly dynamoDbService: DynamoDbService,
    private readonly configService: ConfigService,
  ) {
    super();
    this.regTableName = this.requireTable('DYNAMODB_TABLE_REGISTRATIONS');
    this.talliesTableName = this.requireTable(
      'DYNAMODB_TABLE_REGISTRATION_TALLIES',
    );
    this.logger.log(
      `Using registrations table: ${this.regTableName}, tallies table: ${this.talliesTableName}`,
    );
  }

  private requireTable(key: string): string {
    const tableName = this.configService.get<string>(key);
    if (!tableName) {
      this.logger.error(`${key} is not defined`);
      throw new RegistrationStoreException(`${key} is not defined`);
    }
    return tableName;
  }

  private storeFailure(
    action: string,
    error: unknown,
  ): RegistrationStoreException {
    this.logger.error(
      `Error ${action}`,
      error instanceof Error ? error.stack : String(error),
    );
    return new RegistrationStoreException(`Error ${action}`);
  }

  private tallyKey(eventId: string) {
    return { eventId, entry: TALLY_ENTRY };
  }

  private waitlistKey(eventId: string, orderingKey: number) {
    return { eventId, entry: waitlistEntry(orderingKey) };
  }

  private async readTally(eventId: string): Promise<Tally> {
    const command = new GetCommand({
      TableName: this.talliesTableName,
      Key: this.tallyKey(eventId),
      ConsistentRead: true,
    });

    try {
      const response = await this.dynamoDbService.docClient.send(command);
      return {
        heldSeats: Number(response.Item?.heldSeats ?? 0),
        pendingPromotions: Number(response.Item?.pendingPromotions ?? 0),
        waitlistedCount: Number(response.Item?.waitlistedCount ?? 0),
      };
    } catch (error) {
      throw this.storeFailure(`reading the tally of event ${eventId}`, error);
    }
  }

  async allocateOrderingKey(eventId: string): Promise<number> {
    const command = new UpdateCommand({
      TableName: this.talliesTableName,
      Key: this.tallyKey(eventId),
      UpdateExpression: 'ADD #sequence :one',
      ExpressionAttributeNames: { '#sequence': 'sequence' },
      ExpressionAttributeValues: { ':one': 1 },
      ReturnValues: 'UPDATED_NEW',
    });

    let sequence: unknown;
    try {
      const response = await this.dynamoDbService.docClient.send(command);
      sequence = response.Attributes?.sequence;
    } catch (error) {
      throw this.storeFailure(
        `allocating an ordering key for event ${eventId}`,
        error,
      );
    }

    if (typeof sequence !== 'number') {
      this.logger.error(`Tally for event ${eventId} returned no sequence`);
      throw new RegistrationStoreException('Error allocating an ordering key');
    }
    return sequence;
  }

  async tryCreate(input: NewRegistration): Promise<CreateOutcome> {
    const { userId, eventId, status, orderingKey, capacity } = input;
    const now = new Date().toISOString();
    const registration: Registration = {
      id: uuidv4(),
      userId,
      eventId,
      status,
      registeredAt: orderingKey,
      createdAt: now,
      updatedAt: now,
    };

    const items: TransactItem[] = [
      {
        Put: {
          TableName: this.regTableName,
          Item: registration,
          ConditionExpression:
            'attribute_not_exists(userId) AND attribute_not_exists(eventId)',
        },
      },
    ];
    if (status === RegistrationStatus.CONFIRMED) {
      items.push({
        Update: {
          TableName: this.talliesTableName,
          Key: this.tallyKey(eventId),
          UpdateExpression: 'SET #held = if_not_exists(#held, :zero) + :one',
          ConditionExpression: 'attribute_not_exists(#held) OR #held < :capacity',
          ExpressionAttributeNames: { '#held': TALLY_NAMES['#held'] },
          ExpressionAttributeValues: {
            ':zero': 0,
            ':one': 1,
            ':capacity': capacity,
          },
        },
      });
    } else {
      items.push(
        {
          Put: {
            TableName: this.talliesTableName,
            Item: {
              ...this.waitlistKey(eventId, orderingKey),
              userId,
              registeredAt: orderingKey,
            },
            ConditionExpression: 'attribute_not_exists(#entry)',
            ExpressionAttributeNames: { '#entry': 'entry' },
          },
        },
        {
          Update: {
            TableName: this.talliesTableName,
            Key: this.tallyKey(eventId),
            UpdateExpression:
              'SET #waitlisted = if_not_exists(#waitlisted, :zero) + :one',
            ConditionExpression: '#held >= :capacity',
            ExpressionAttributeNames: {
              '#held': TALLY_NAMES['#held'],
              '#waitlisted': TALLY_NAMES['#waitlisted'],
            },
            ExpressionAttributeValues: {
              ':zero': 0,
              ':one': 1,
              ':capacity': capacity,
            },
          },
        },
      );
    }

    try {
      await this.dynamoDbService.docClient.send(
        new TransactWriteCommand({ TransactItems: items }),
      );
      return { outcome: 'created', registration };
    } catch (error) {
      if (error instanceof TransactionCanceledException) {
        const reasons = error.CancellationReasons ?? [];
        if (failedCondition(reasons[0])) {
          return { outcome: 'already-exists' };
        }
        if (lostRace(reasons)) {
          return { outcome: 'conflict' };
        }
      }
      throw this.storeFailure(
        `creating registration for user ${userId}, event ${eventId}`,
        error,
      );
    }
  }

  async get(userId: string, eventId: string): Promise<Registration | null> {
    const command = new GetCommand({
      TableName: this.regTableName,
      Key: { userId, eventId },
      ConsistentRead: true,
    });

    try {
      const response = await this.dynamoDbService.docClient.send(command);
      return response.Item ? (response.Item as Registration) : null;
    } catch (error) {
      throw this.storeFailure('checking for existing registration', error);
    }
  }

  async delete(userId: string, eventId: string): Promise<DeleteOutcome> {
    const current = await this.get(userId, eventId);
    if (!current) {
      return { outcome: 'not-found' };
    }

    const items: TransactItem[] = [
      {
        Delete: {
          TableName: this.regTableName,
          Key: { userId, eventId },
          ConditionExpression: '#status = :status',
          ExpressionAttributeNames: { '#status': 'status' },
          ExpressionAttributeValues: { ':status': current.status },
        },
      },
    ];

    if (current.status === RegistrationStatus.WAITLISTED) {
      items.push(
        {
          Delete: {
            TableName: this.talliesTableName,
            Key: this.waitlistKey(eventId, current.registeredAt),
          },
        },
        {
          Update: {
            TableName: this.talliesTableName,
            Key: this.tallyKey(eventId),
            UpdateExpression: 'SET #waitlisted = #waitlisted - :one',
            ConditionExpression: '#waitlisted > :zero',
            ExpressionAttributeNames: {
              '#waitlisted': TALLY_NAMES['#waitlisted'],
            },
            ExpressionAttributeValues: { ':zero': 0, ':one': 1 },
          },
        },
      );
    } else {
      const tally = await this.readTally(eventId);
      const reserve = tally.waitlistedCount > tally.pendingPromotions;
      items.push({
        Update: reserve
          ? {
              TableName: this.talliesTableName,
              Key: this.tallyKey(eventId),
              UpdateExpression:
                'SET #pending = if_not_exists(#pending, :zero) + :one',
              ConditionExpression:
                '#waitlisted > :zero AND (attribute_not_exists(#pending) OR #waitlisted > #pending)',
              ExpressionAttributeNames: {
                '#pending': TALLY_NAMES['#pending'],
                '#waitlisted': TALLY_NAMES['#waitlisted'],
              },
              ExpressionAttributeValues: { ':zero': 0, ':one': 1 },
            }
          : {
              TableName: this.talliesTableName,
              Key: this.tallyKey(eventId),
              UpdateExpression: 'SET #held = #held - :one',
              ConditionExpression:
                '#held > :zero AND (attribute_not_exists(#waitlisted) OR #waitlisted = :zero OR #waitlisted <= #pending)',
              ExpressionAttributeNames: TALLY_NAMES,
              ExpressionAttributeValues: { ':zero': 0, ':one': 1 },
            },
      });
    }

    try {
      await this.dynamoDbService.docClient.send(
        new TransactWriteCommand({ TransactItems: items }),
      );
      return { outcome: 'deleted', previous: current };
    } catch (error) {
      // The record or the waitlist changed since the reads above.
      if (
        error instanceof TransactionCanceledException &&
        lostRace(error.CancellationReasons ?? [])
      ) {
        return { outcome: 'conflict' };
      }
      throw this.storeFailure(
        `cancelling registration for user ${userId}, event ${eventId}`,
        error,
      );
    }
  }

  async countConfirmed(eventId: string): Promise<number> {
    return (await this.readTally(eventId)).heldSeats;
  }

  async countPendingPromotions(eventId: string): Promise<number> {
    return (await this.readTally(eventId)).pendingPromotions;
  }

  async firstWaitlisted(
    eventId: string,
    after?: number,
  ): Promise<Registration | null> {
    let from =
      after === undefined ? WAITLIST_ENTRY_PREFIX : waitlistEntry(after);

    try {
      while (true) {
        const response = await this.dynamoDbService.docClient.send(
          new QueryCommand({
            TableName: this.talliesTableName,
            KeyConditionExpression: 'eventId = :eventId AND #entry > :from',
            ExpressionAttributeNames: { '#entry': 'entry' },
            ExpressionAttributeValues: { ':eventId': eventId, ':from': from },
            ConsistentRead: true,
            Limit: 1,
          }),
        );
        const head = response.Items?.[0];
        if (!head || typeof head.userId !== 'string') {
          return null;
        }

        const registration = await this.get(head.userId, eventId);
        if (registration) {
          return registration;
        }
        this.logger.warn(
          `Waitlist entry ${String(head.entry)} of event ${eventId} has no registration`,
        );
        from = String(head.entry);
      }
    } catch (error) {
      if (error instanceof RegistrationStoreException) {
        throw error;
      }
      throw this.storeFailure(
        `reading the waitlist of event ${eventId}`,
        error,
      );
    }
  }

  async promote(registration: Registration): Promise<PromoteOutcome> {
    const { userId, eventId, registeredAt } = registration;
    const updatedAt = new Date().toISOString();
    const command = new TransactWriteCommand({
      TransactItems: [
        {
          Update: {
            TableName: this.regTableName,
            Key: { userId, eventId },
            UpdateExpression: 'SET #status = :confirmed, #updatedAt = :updatedAt',
            ConditionExpression: '#status = :waitlisted',
            ExpressionAttributeNames: {
              '#status': 'status',
              '#updatedAt': 'updatedAt',
            },
            ExpressionAttributeValues: {
              ':confirmed': RegistrationStatus.CONFIRMED,
              ':waitlisted': RegistrationStatus.WAITLISTED,
              ':updatedAt': updatedAt,
            },
            ReturnValuesOnConditionCheckFailure: 'ALL_OLD',
          },
        },
        {
          Delete: {
            TableName: this.talliesTableName,
            Key: this.waitlistKey(eventId, registeredAt),
            ConditionExpression: 'attribute_exists(#entry)',
            ExpressionAttributeNames: { '#entry': 'entry' },
          },
        },
        {
          // The reserved seat passes to the promoted registration as is.
          Update: {
            TableName: this.talliesTableName,
            Key: this.tallyKey(eventId),
            UpdateExpression:
              'SET #pending = #pending - :one, #waitlisted = #waitlisted - :one',
            ConditionExpression: '#pending > :zero',
            ExpressionAttributeNames: {
              '#pending': TALLY_NAMES['#pending'],
              '#waitlisted': TALLY_NAMES['#waitlisted'],
            },
            ExpressionAttributeValues: { ':zero': 0, ':one': 1 },
          },
        },
      ],
    });

    try {
      await this.dynamoDbService.docClient.send(command);
      return { outcome: 'promoted', updatedAt };
    } catch (error) {
      if (error instanceof TransactionCanceledException) {
        const reasons = error.CancellationReasons ?? [];
        const [recordReason, , tallyReason] = reasons;
        if (failedCondition(recordReason)) {
          if (!recordReason?.Item) {
            return { outcome: 'not-found' };
          }
          const current = unmarshall(recordReason.Item);
          return current.status === RegistrationStatus.CONFIRMED
            ? { outcome: 'already-confirmed' }
            : { outcome: 'conflict' };
        }
        if (failedCondition(tallyReason)) {
          return { outcome: 'no-reservation' };
        }
        if (lostRace(reasons)) {
          return { outcome: 'conflict' };
        }
      }
      throw this.storeFailure(
        `promoting user ${userId} on event ${eventId}`,
        error,
      );
    }
  }

  async releaseReservation(eventId: string): Promise<ReleaseOutcome> {
    const command = new UpdateCommand({
      TableName: this.talliesTableName,
      Key: this.tallyKey(eventId),
      UpdateExpression: 'SET #held = #held - :one, #pending = #pending - :one',
      ConditionExpression:
        '#pending > :zero AND (attribute_not_exists(#waitlisted) OR #waitlisted < #pending)',
      ExpressionAttributeNames: TALLY_NAMES,
      ExpressionAttributeValues: { ':zero': 0, ':one': 1 },
    });

    try {
      await this.dynamoDbService.docClient.send(command);
      return { outcome: 'released' };
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        return { outcome: 'conflict' };
      }
      throw this.storeFailure(
        `releasing a reserved seat of event ${eventId}`,
        error,
      );
    }
  }

  async listForUser(
    userId: string,
    status?: RegistrationStatus,
  ): Promise<Registration[]> {
    return this.queryAll(
      {
        TableName: this.regTableName,
        KeyConditionExpression: 'userId = :userId',
        ExpressionAttributeValues: { ':userId': userId },
      },
      status,
      `listing registrations of user ${userId}`,
    );
  }

  async listForEvent(
    eventId: string,
    status?: RegistrationStatus,
  ): Promise<Registration[]> {
    return this.queryAll(
      {
        TableName: this.regTableName,
        IndexName: REGISTRATIONS_BY_EVENT_INDEX,
        KeyConditionExpression: 'eventId = :eventId',
        ExpressionAttributeValues: { ':eventId': eventId },
        ScanIndexForward: true,
      },
      status,
      `listing registrations of event ${eventId}`,
    );
  }

  private async queryAll(
    baseInput: QueryCommandInput,
    status: RegistrationStatus | undefined,
    action: string,
  ): Promise<Registration[]> {
    const queryInput: QueryCommandInput = { ...baseInput };
    if (status) {
      queryInput.FilterExpression = '#status = :status';
      queryInput.ExpressionAttributeNames = { '#status': 'status' };
      queryInput.ExpressionAttributeValues = {
        ...baseInput.ExpressionAttributeValues,
        ':status': status,
      };
    }

    const registrations: Registration[] = [];
    let exclusiveStartKey: QueryCommandInput['ExclusiveStartKey'];
    try {
      do {
        const response = await this.dynamoDbService.docClient.send(
          new QueryCommand({ ...queryInput, ExclusiveStartKey: exclusiveStartKey }),
        );
        registrations.push(...((response.Items ?? []) as Registration[]));
        exclusiveStartKey = response.LastEvaluatedKey;
      } while (exclusiveStartKey);
    } catch (error) {
      throw this.storeFailure(action, error);
    }
    return registrations;
  }
}
