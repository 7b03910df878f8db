import { ConfigType, registerAs } from '@nestjs/config';
import { readInt } from './env.util';

export const engagementConfig = registerAs('engagement', () => ({
  /** Messages kept per event chat log. */
  chatRetentionLimit: readInt('CHAT_RETENTION_LIMIT', 20),
  chatMessageMaxLength: readInt('CHAT_MESSAGE_MAX_LENGTH', 300),
  directMessageMaxLength: readInt('DIRECT_MESSAGE_MAX_LENGTH', 500),
  userTable: process.env.USER_TABLE ?? 'auth_user',
  locationTable: process.env.LOCATION_TABLE ?? 'loc_detail_publicart',
}));

export type EngagementConfig = ConfigType<typeof engagementConfig>;
