import { Module } from '@nestjs/common';
import { CLOCK } from '../../application/ports';
import { SystemClock } from './system-clock';

@Module({
  providers: [{ provide: CLOCK, useClass: SystemClock }],
  exports: [CLOCK],
})
export class ClockModule {}
