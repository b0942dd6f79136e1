import { Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GetCommand } from '@aws-sdk/lib-dynamodb';
import { DynamoDbService } from '../aws/dynamodb/dynamodb.service';
import { User } from './interfaces/user.interface';

@Injectable()
export class UsersService {
  private readonly tableName: string;
  private readonly logger = new Logger(UsersService.name);

  constructor(
    private readonly dynamoDbService: DynamoDbService,
    private readonly configService: ConfigService,
  ) {
    const usersTableName = this.configService.get<string>('DYNAMODB_TABLE_USERS');
    if (!usersTableName) {
      throw new Error('DYNAMODB_TABLE_USERS environment variable is not set.');
    }
    this.tableName = usersTableName;
    this.logger.log(`UsersService initialized for table: ${this.tableName}`);
  }

  async findUserById(userId: string): Promise<User | null> {
    this.logger.debug(`Getting user by id: ${userId} from ${this.tableName}`);
    const command = new GetCommand({
      TableName: this.tableName,
      Key: { userId },
    });

    try {
      const response = await this.dynamoDbService.docClient.send(command);
      if (!response.Item) {
        this.logger.warn(`User with id ${userId} not found.`);
        return null;
      }

      return response.Item as User;
    } catch (error) {
      this.logger.error(
        `Error to get user by id: ${userId}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new InternalServerErrorException(
        'An internal server error occurred while retrieving the user',
      );
    }
  }

  async userExists(userId: string): Promise<boolean> {
    return (await this.findUserById(userId)) !== null;
  }
}
