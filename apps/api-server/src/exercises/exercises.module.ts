import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ExercisesController } from './exercises.controller';
import { ExercisesService } from './exercises.service';
import { QuestionsModule } from '../questions/questions.module';
import { Exercise } from '../entities';

@Module({
  imports: [TypeOrmModule.forFeature([Exercise]), QuestionsModule],
  controllers: [ExercisesController],
  providers: [ExercisesService],
  exports: [ExercisesService],
})
export class ExercisesModule {}
