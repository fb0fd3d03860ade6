import { Module } from '@nestjs/common';
import { TravelApiClient } from './travel-api.client';
import { WebController } from './web.controller';
import { WebSessionStore } from './web-session.store';

@Module({
  providers: [TravelApiClient, WebSessionStore],
  controllers: [WebController],
})
export class WebModule {}
