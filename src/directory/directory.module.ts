import { Global, Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Sequelize } from 'sequelize-typescript';
import { engagementConfig } from '../config/engagement.config';
import { LOCATION_DIRECTORY, USER_DIRECTORY } from './directory.interfaces';
import { SqlRecordDirectory } from './sql-record.directory';

@Global()
@Module({
  providers: [
    {
      provide: USER_DIRECTORY,
      inject: [Sequelize, engagementConfig.KEY],
      useFactory: (sequelize: Sequelize, config: ConfigType<typeof engagementConfig>) =>
        new SqlRecordDirectory(sequelize, config.userTable),
    },
    {
      provide: LOCATION_DIRECTORY,
      inject: [Sequelize, engagementConfig.KEY],
      useFactory: (sequelize: Sequelize, config: ConfigType<typeof engagementConfig>) =>
        new SqlRecordDirectory(sequelize, config.locationTable),
    },
  ],
  exports: [USER_DIRECTORY, LOCATION_DIRECTORY],
})
export class DirectoryModule {}
