import {
  Injectable,
  BadRequestException,
  ConflictException,
  NotFoundException,
  Logger,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import {
  Answer,
  DependencyOperator,
  Question,
  QuestionDependency,
  Team,
} from '../entities';
import { DependencyCheck } from './dependency-check';
import { CreateDependencyDto } from './questions.dto';

/**
 * QuestionDependenciesService – Prerequisite graph between questions.
 *
 * Evaluation rules (a prerequisite is "completed" when any user answered it
 * correctly on behalf of the team):
 * - OR: completed when at least one OR prerequisite is completed
 * - AND: completed when every AND prerequisite is completed
 * - no edges of an operator: that operator is trivially completed
 *
 * Only direct prerequisites are inspected. The graph is kept acyclic when
 * edges are added, so a question can always be unlocked from some root;
 * the cycle check and the insert share one serializable transaction.
 */
@Injectable()
export class QuestionDependenciesService implements DependencyCheck {
  private readonly logger = new Logger(QuestionDependenciesService.name);

  constructor(
    @InjectRepository(QuestionDependency)
    private readonly dependencyRepo: Repository<QuestionDependency>,
    @InjectRepository(Question) private readonly questionRepo: Repository<Question>,
    @InjectRepository(Answer) private readonly answerRepo: Repository<Answer>,
  ) {}

  async orDependenciesCompleted(question: Question, team: Team): Promise<boolean> {
    const prerequisiteIds = await this.prerequisiteIds(question, 'OR');
    if (prerequisiteIds.length === 0) return true;

    const completed = await this.completedQuestionIds(prerequisiteIds, team);
    return completed.size > 0;
  }

  async andDependenciesCompleted(question: Question, team: Team): Promise<boolean> {
    const prerequisiteIds = await this.prerequisiteIds(question, 'AND');
    if (prerequisiteIds.length === 0) return true;

    const completed = await this.completedQuestionIds(prerequisiteIds, team);
    return prerequisiteIds.every((id) => completed.has(id));
  }

  /**
   * Add the edge "question depends on prerequisite".
   *
   * @throws NotFoundException if the prerequisite does not exist
   * @throws BadRequestException for self edges, edges across exercises and
   *   edges that would close a cycle
   * @throws ConflictException if the edge already exists
   */
  async addDependency(question: Question, dto: CreateDependencyDto): Promise<QuestionDependency> {
    if (dto.prerequisiteId === question.id) {
      throw new BadRequestException('A question cannot depend on itself');
    }

    const prerequisite = await this.questionRepo.findOne({ where: { id: dto.prerequisiteId } });
    if (!prerequisite) throw new NotFoundException('Prerequisite question not found');

    if (prerequisite.exerciseId !== question.exerciseId) {
      throw new BadRequestException('Prerequisite must belong to the same exercise');
    }

    // Cycle check and insert must see the same edge set.
    return this.dependencyRepo.manager.transaction('SERIALIZABLE', async (manager) => {
      const dependencies = manager.getRepository(QuestionDependency);
      const edges = await dependencies.find({
        where: { question1: { exerciseId: question.exerciseId } },
      });

      if (edges.some((edge) => edge.question1Id === question.id && edge.question2Id === prerequisite.id)) {
        throw new ConflictException('Dependency already exists');
      }

      if (this.reaches(edges, prerequisite.id, question.id)) {
        this.logger.warn(
          `Rejected cyclic dependency: question=${question.id} prerequisite=${prerequisite.id}`,
        );
        throw new BadRequestException('Dependency would create a cycle');
      }

      return dependencies.save(
        dependencies.create({
          question1Id: question.id,
          question2Id: prerequisite.id,
          operator: dto.operator,
        }),
      );
    });
  }

  async listDependencies(questionId: string): Promise<QuestionDependency[]> {
    return this.dependencyRepo.find({
      where: { question1Id: questionId },
      relations: ['question2'],
    });
  }

  private async prerequisiteIds(question: Question, operator: DependencyOperator): Promise<string[]> {
    const edges = await this.dependencyRepo.find({
      where: { question1Id: question.id, operator },
      select: { question2Id: true },
    });
    return [...new Set(edges.map((edge) => edge.question2Id))];
  }

  private async completedQuestionIds(questionIds: string[], team: Team): Promise<Set<string>> {
    const answers = await this.answerRepo.find({
      where: { questionId: In(questionIds), teamId: team.id, correct: true },
      select: { questionId: true },
    });
    return new Set(answers.map((answer) => answer.questionId));
  }

  /** Iterative depth-first walk along "depends on" edges. */
  private reaches(edges: QuestionDependency[], fromId: string, targetId: string): boolean {
    const adjacency = new Map<string, string[]>();
    for (const edge of edges) {
      const next = adjacency.get(edge.question1Id) ?? [];
      next.push(edge.question2Id);
      adjacency.set(edge.question1Id, next);
    }

    const visited = new Set<string>();
    const stack = [fromId];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || visited.has(current)) continue;
      if (current === targetId) return true;
      visited.add(current);
      stack.push(...(adjacency.get(current) ?? []));
    }
    return false;
  }
}
