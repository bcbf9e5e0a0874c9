import { config } from '../config.js';
import { getItem } from '../dynamodb.js';

const TABLE = config.tables.users;

// Registration-relevant slice of a user record; accounts are managed elsewhere
interface UserItem {
  userId: string;
  isActive?: boolean;
  canRegisterSerials?: boolean;
}

export async function isEligibleToRegister(userId: string): Promise<boolean> {
  const item = await getItem<UserItem>({
    TableName: TABLE,
    Key: {
      PK: `USER#${userId}`,
      SK: 'META',
    },
    ProjectionExpression: 'userId, isActive, canRegisterSerials',
  });

  return !!item && item.isActive === true && item.canRegisterSerials === true;
}
