import { BadRequestException } from '@nestjs/common';

export function requireNonEmpty(value: string | undefined, field: string): string {
  const trimmed = value?.trim() ?? '';
  if (!trimmed) {
    throw new BadRequestException(`${field} cannot be empty`);
  }
  return trimmed;
}

export function requirePositiveId(id: number): number {
  if (!Number.isInteger(id) || id <= 0) {
    throw new BadRequestException('Invalid destination ID');
  }
  return id;
}
