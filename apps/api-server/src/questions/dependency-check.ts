import { Question, Team } from '../entities';

/**
 * Capability that decides whether a team has completed the prerequisites
 * of a question. Injected under DEPENDENCY_CHECK so callers can be tested
 * against fixed-return doubles.
 */
export interface DependencyCheck {
  orDependenciesCompleted(question: Question, team: Team): Promise<boolean>;
  andDependenciesCompleted(question: Question, team: Team): Promise<boolean>;
}

export const DEPENDENCY_CHECK = Symbol('DEPENDENCY_CHECK');
