import { Module } from '@nestjs/common';
import { DataModule } from '../data/data.module';
import { ThemesService } from './themes.service';

@Module({
  imports: [DataModule],
  providers: [ThemesService],
  exports: [ThemesService],
})
export class ThemesModule {}
