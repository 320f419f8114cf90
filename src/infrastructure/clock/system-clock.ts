import { Injectable } from '@nestjs/common';
import { IClock } from '../../application/ports/clock.port';

export function formatLocalDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

@Injectable()
export class SystemClock implements IClock {
  now(): Date {
    return new Date();
  }

  today(): string {
    return formatLocalDate(this.now());
  }
}
