import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CategoryService } from './category.service';

@Module({
  imports: [ConfigModule],
  providers: [CategoryService],
  exports: [CategoryService],
})
export class CategoryModule {}
