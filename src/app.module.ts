import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SequelizeModule } from '@nestjs/sequelize';
import { ChatModule } from './chat/chat.module';
import { DatabaseConfig, databaseConfig } from './config/database.config';
import { engagementConfig } from './config/engagement.config';
import { DirectChatModule } from './direct-chat/direct-chat.module';
import { DirectoryModule } from './directory/directory.module';
import { EventModule } from './event/event.module';
import { FavoriteModule } from './favorite/favorite.module';
import { InviteModule } from './invite/invite.module';
import { JoinRequestModule } from './join-request/join-request.module';
import { MembershipModule } from './membership/membership.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [databaseConfig, engagementConfig] }),
    SequelizeModule.forRootAsync({
      inject: [databaseConfig.KEY],
      useFactory: (db: DatabaseConfig) => ({
        dialect: 'postgres',
        host: db.host,
        port: db.port,
        username: db.username,
        password: db.password,
        database: db.database,
        autoLoadModels: true,
        synchronize: db.synchronize,
        logging: db.logging,
        dialectOptions: db.ssl
          ? {
              ssl: {
                require: true,
                rejectUnauthorized: false,
              },
            }
          : {},
      }),
    }),
    DirectoryModule,
    MembershipModule,
    InviteModule,
    EventModule,
    JoinRequestModule,
    ChatModule,
    DirectChatModule,
    FavoriteModule,
  ],
})
export class AppModule {}
