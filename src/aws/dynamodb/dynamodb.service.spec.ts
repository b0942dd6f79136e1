import { DynamoDbService } from './dynamodb.service';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

jest.mock('@aws-sdk/client-dynamodb');
jest.mock('@aws-sdk/lib-dynamodb');

const configWith = (env: Record<string, string | undefined>): ConfigService =>
  ({ get: jest.fn((key: string) => env[key]) }) as unknown as ConfigService;

describe('DynamoDbService', () => {
  const fullEnv = {
    AWS_REGION: 'us-east-1',
    AWS_ACCESS_KEY_ID: 'key',
    AWS_SECRET_ACCESS_KEY: 'secret',
    AWS_SESSION_TOKEN: 'token',
  };

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => {});
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => {});
  });

  it('should be defined and configure DynamoDB client with credentials', () => {
    const service = new DynamoDbService(configWith(fullEnv));
    expect(service).toBeDefined();
    expect(DynamoDBClient).toHaveBeenCalledWith({
      region: 'us-east-1',
      credentials: {
        accessKeyId: 'key',
        secretAccessKey: 'secret',
        sessionToken: 'token',
      },
    });
    expect(DynamoDBDocumentClient.from).toHaveBeenCalledWith(
      expect.any(DynamoDBClient),
      { marshallOptions: { removeUndefinedValues: true } },
    );
    expect(Logger.prototype.log).toHaveBeenCalledWith(
      'Configuring DynamoDB client with AWS credentials in .env',
    );
    expect(Logger.prototype.log).toHaveBeenCalledWith(
      'DynamoDbService configured for region: us-east-1.',
    );
  });

  it('should configure DynamoDB client without credentials', () => {
    new DynamoDbService(configWith({ AWS_REGION: 'us-east-1' }));
    expect(DynamoDBClient).toHaveBeenCalledWith({ region: 'us-east-1' });
    expect(Logger.prototype.log).toHaveBeenCalledWith(
      'AWS credentials not defined in .env, using the default provider chain',
    );
  });

  it('should point the client at a local endpoint when one is configured', () => {
    new DynamoDbService(
      configWith({
        AWS_REGION: 'us-west-2',
        DYNAMODB_ENDPOINT_URL: 'http://localhost:8000',
      }),
    );
    expect(DynamoDBClient).toHaveBeenCalledWith({
      region: 'us-west-2',
      endpoint: 'http://localhost:8000',
    });
  });

  it('should throw error if region is not defined', () => {
    expect(() => new DynamoDbService(configWith({}))).toThrow(
      'AWS_REGION is not defined in environment variables',
    );
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      'AWS_REGION is not defined in environment variables',
    );
  });

  it('should log onModuleInit', async () => {
    const service = new DynamoDbService(configWith(fullEnv));
    await service.onModuleInit();
    expect(Logger.prototype.log).toHaveBeenCalledWith(
      'DynamoDbService initialized.',
    );
  });

  it('should destroy client and log onModuleDestroy', async () => {
    const service = new DynamoDbService(configWith(fullEnv));
    await service.onModuleDestroy();
    expect(service.client.destroy).toHaveBeenCalled();
    expect(Logger.prototype.log).toHaveBeenCalledWith(
      'DynamoDbService destroyed and DynamoDB client finalized.',
    );
  });
});
