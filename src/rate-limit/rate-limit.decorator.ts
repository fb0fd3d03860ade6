import { Reflector } from '@nestjs/core';
import type { RateLimitClass } from './rate-limit.types';

export const RateLimit = Reflector.createDecorator<RateLimitClass>();
