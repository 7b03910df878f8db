import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { Event } from '../event/model/event.model';
import { EventFavorite } from './model/event-favorite.model';
import { FavoriteService } from './favorite.service';

@Module({
  imports: [SequelizeModule.forFeature([EventFavorite, Event])],
  providers: [FavoriteService],
  exports: [FavoriteService],
})
export class FavoriteModule {}
