import { Module } from '@nestjs/common';
import { TravelEventsListener } from './travel.events.listener';

@Module({
  providers: [TravelEventsListener],
})
export class EventsModule {}
