import { Module } from '@nestjs/common';
import { DataModule } from '../data/data.module';
import { MomentumService } from './momentum.service';

@Module({
  imports: [DataModule],
  providers: [MomentumService],
  exports: [MomentumService],
})
export class MomentumModule {}
