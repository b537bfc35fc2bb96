import { Inject, Injectable } from '@nestjs/common';
import { Question, Team } from '../entities';
import { DEPENDENCY_CHECK, DependencyCheck } from './dependency-check';

export interface Availability {
  orDependenciesCompleted: boolean;
  andDependenciesCompleted: boolean;
  ableToAnswer: boolean;
}

/**
 * AnswerabilityService – A team may answer a question once both its OR and
 * its AND prerequisites are completed.
 */
@Injectable()
export class AnswerabilityService {
  constructor(@Inject(DEPENDENCY_CHECK) private readonly dependencyCheck: DependencyCheck) {}

  async ableToAnswer(question: Question, team: Team): Promise<boolean> {
    const availability = await this.availability(question, team);
    return availability.ableToAnswer;
  }

  async availability(question: Question, team: Team): Promise<Availability> {
    const [orDependenciesCompleted, andDependenciesCompleted] = await Promise.all([
      this.dependencyCheck.orDependenciesCompleted(question, team),
      this.dependencyCheck.andDependenciesCompleted(question, team),
    ]);

    return {
      orDependenciesCompleted,
      andDependenciesCompleted,
      ableToAnswer: orDependenciesCompleted && andDependenciesCompleted,
    };
  }
}
