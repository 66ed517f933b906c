import { Module } from '@nestjs/common';
import { CategoryModule } from '../category/category.module';
import { VideoService } from './video.service';

@Module({
  imports: [CategoryModule],
  providers: [VideoService],
  exports: [VideoService],
})
export class VideoModule {}
