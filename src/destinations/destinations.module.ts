import { Module } from '@nestjs/common';
import { DestinationsController } from './destinations.controller';
import {
  DestinationsRepository,
  DrizzleDestinationsRepository,
} from './destinations.repository';
import { DestinationsService } from './destinations.service';

@Module({
  providers: [
    DestinationsService,
    { provide: DestinationsRepository, useClass: DrizzleDestinationsRepository },
  ],
  controllers: [DestinationsController],
  exports: [DestinationsService, DestinationsRepository],
})
export class DestinationsModule {}
