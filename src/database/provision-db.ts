import {
  CreateTableCommand,
  CreateTableCommandInput,
  DynamoDBClient,
  DynamoDBClientConfig,
  ListTablesCommand,
  waitUntilTableExists,
} from '@aws-sdk/client-dynamodb';
import { config } from 'dotenv';
import { resolve } from 'path';
import { REGISTRATIONS_BY_EVENT_INDEX } from '../registrations/registration.constants';

export interface TableNames {
  users: string;
  events: string;
  registrations: string;
  registrationTallies: string;
}

export function tableNamesFromEnv(env: NodeJS.ProcessEnv): TableNames {
  return {
    users: env.DYNAMODB_TABLE_USERS || 'Users',
    events: env.DYNAMODB_TABLE_EVENTS || 'Events',
    registrations: env.DYNAMODB_TABLE_REGISTRATIONS || 'Registrations',
    registrationTallies:
      env.DYNAMODB_TABLE_REGISTRATION_TALLIES || 'RegistrationTallies',
  };
}

export function buildTableDefinitions(
  names: TableNames,
): CreateTableCommandInput[] {
  const userTableParams: CreateTableCommandInput = {
    TableName: names.users,
    AttributeDefinitions: [{ AttributeName: 'userId', AttributeType: 'S' }],
    KeySchema: [{ AttributeName: 'userId', KeyType: 'HASH' }],
    BillingMode: 'PAY_PER_REQUEST',
  };

  const eventTableParams: CreateTableCommandInput = {
    TableName: names.events,
    AttributeDefinitions: [{ AttributeName: 'eventId', AttributeType: 'S' }],
    KeySchema: [{ AttributeName: 'eventId', KeyType: 'HASH' }],
    BillingMode: 'PAY_PER_REQUEST',
  };

  const registrationsTableParams: CreateTableCommandInput = {
    TableName: names.registrations,
    AttributeDefinitions: [
      { AttributeName: 'userId', AttributeType: 'S' },
      { AttributeName: 'eventId', AttributeType: 'S' },
      { AttributeName: 'registeredAt', AttributeType: 'N' },
    ],
    KeySchema: [
      { AttributeName: 'userId', KeyType: 'HASH' },
      { AttributeName: 'eventId', KeyType: 'RANGE' },
    ],
    BillingMode: 'PAY_PER_REQUEST',
    GlobalSecondaryIndexes: [
      {
        IndexName: REGISTRATIONS_BY_EVENT_INDEX,
        KeySchema: [
          { AttributeName: 'eventId', KeyType: 'HASH' },
          { AttributeName: 'registeredAt', KeyType: 'RANGE' },
        ],
        Projection: { ProjectionType: 'ALL' },
      },
    ],
  };

  // One tally item per event plus one entry per waitlisted registration,
  // so the waitlist head can be read with a consistent query.
  const registrationTalliesTableParams: CreateTableCommandInput = {
    TableName: names.registrationTallies,
    AttributeDefinitions: [
      { AttributeName: 'eventId', AttributeType: 'S' },
      { AttributeName: 'entry', AttributeType: 'S' },
    ],
    KeySchema: [
      { AttributeName: 'eventId', KeyType: 'HASH' },
      { AttributeName: 'entry', KeyType: 'RANGE' },
    ],
    BillingMode: 'PAY_PER_REQUEST',
  };

  return [
    userTableParams,
    eventTableParams,
    registrationsTableParams,
    registrationTalliesTableParams,
  ];
}

export function createClient(env: NodeJS.ProcessEnv): DynamoDBClient {
  const region = env.AWS_REGION;
  if (!region) {
    throw new Error('AWS_REGION is not set in the environment variables.');
  }

  const clientConfig: DynamoDBClientConfig = { region };
  if (env.DYNAMODB_ENDPOINT_URL) {
    clientConfig.endpoint = env.DYNAMODB_ENDPOINT_URL;
  }
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    clientConfig.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      sessionToken: env.AWS_SESSION_TOKEN,
    };
  }
  return new DynamoDBClient(clientConfig);
}

export const createTable = async (
  dbClient: DynamoDBClient,
  tableParams: CreateTableCommandInput,
) => {
  const tableName = tableParams.TableName;
  if (!tableName) {
    throw new Error('Table name is missing in the table parameters.');
  }

  console.log(`Checking if table ${tableName} exists...`);
  const existingTables = await dbClient.send(new ListTablesCommand({}));

  if (existingTables.TableNames?.includes(tableName)) {
    console.log(`Table ${tableName} already exists. Skipping creation.`);
    return;
  }

  try {
    console.log(`Creating table ${tableName}...`);
    await dbClient.send(new CreateTableCommand(tableParams));
    console.log(`Awaiting for table ${tableName} to become active...`);
    await waitUntilTableExists(
      { client: dbClient, maxWaitTime: 180 },
      { TableName: tableName },
    );
    console.log(`Table ${tableName} created successfully.`);
  } catch (error) {
    console.error(`Error creating table ${tableName}:`, error);
    throw error;
  }
};

export const provisionTables = async (
  dbClient: DynamoDBClient,
  tables: CreateTableCommandInput[],
) => {
  for (const tableParams of tables) {
    await createTable(dbClient, tableParams);
  }
  console.log('All tables provisioned successfully.');
};

if (require.main === module) {
  config({ path: resolve(__dirname, '../../.env') });
  console.log('Starting database provisioning...');

  const run = async () => {
    const dbClient = createClient(process.env);
    try {
      await provisionTables(
        dbClient,
        buildTableDefinitions(tableNamesFromEnv(process.env)),
      );
    } finally {
      dbClient.destroy();
    }
  };

  run().catch((error: unknown) => {
    console.error('Error provisioning tables:', error);
    process.exit(1);
  });
}
