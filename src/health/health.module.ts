import { Global, MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import { ShutdownMiddleware } from './shutdown.middleware';
import { ShutdownService } from './shutdown.service';

@Global()
@Module({
  providers: [HealthService, ShutdownService],
  controllers: [HealthController],
  exports: [ShutdownService],
})
export class HealthModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(ShutdownMiddleware).forRoutes('*');
  }
}
