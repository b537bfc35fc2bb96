import { DataSource } from 'typeorm';
import {
  Answer,
  AnswerTestCaseResult,
  DependencyOperator,
  Exercise,
  Question,
  QuestionDependency,
  Team,
  TestCase,
  User,
} from '../src/entities';

let sequence = 0;

function next(): number {
  sequence += 1;
  return sequence;
}

/** Unsaved user with valid attributes */
export function buildUser(overrides: Partial<User> = {}): User {
  const n = next();
  return Object.assign(
    new User(),
    {
      name: `Student ${n}`,
      email: `student${n}@example.com`,
      password: 'test-password',
      teacher: false,
      admin: false,
    },
    overrides,
  );
}

/** Persisted user; skips bcrypt to keep tests fast */
export async function createUser(ds: DataSource, overrides: Partial<User> = {}): Promise<User> {
  const user = buildUser({ passwordHash: 'test-hash', ...overrides });
  user.password = undefined;
  user.generateAnonymousId();
  return ds.getRepository(User).save(user);
}

export async function createTeam(
  ds: DataSource,
  attrs: { owner?: User; members?: User[]; exercises?: Exercise[] } = {},
): Promise<Team> {
  const owner = attrs.owner ?? (await createUser(ds));
  const repo = ds.getRepository(Team);
  const team = repo.create({
    name: `Team ${next()}`,
    ownerId: owner.id,
    members: attrs.members ?? [],
    exercises: attrs.exercises ?? [],
  });
  return repo.save(team);
}

export async function createExercise(ds: DataSource, author?: User): Promise<Exercise> {
  const owner = author ?? (await createUser(ds, { teacher: true }));
  const repo = ds.getRepository(Exercise);
  return repo.save(
    repo.create({ title: `Exercise ${next()}`, description: null, authorId: owner.id }),
  );
}

export async function createQuestion(ds: DataSource, exercise?: Exercise): Promise<Question> {
  const parent = exercise ?? (await createExercise(ds));
  const repo = ds.getRepository(Question);
  const n = next();
  return repo.save(
    repo.create({
      exerciseId: parent.id,
      title: `Question ${n}`,
      description: `Print the number ${n}`,
      score: 10,
      sortOrder: n,
    }),
  );
}

export async function createQuestionPair(
  ds: DataSource,
  exercise: Exercise,
): Promise<[Question, Question]> {
  const first = await createQuestion(ds, exercise);
  const second = await createQuestion(ds, exercise);
  return [first, second];
}

export async function createDependency(
  ds: DataSource,
  question1: Question,
  question2: Question,
  operator: DependencyOperator,
): Promise<QuestionDependency> {
  const repo = ds.getRepository(QuestionDependency);
  return repo.save(
    repo.create({ question1Id: question1.id, question2Id: question2.id, operator }),
  );
}

export async function createTestCase(
  ds: DataSource,
  question: Question,
  attrs: { input?: string; output?: string } = {},
): Promise<TestCase> {
  const repo = ds.getRepository(TestCase);
  return repo.save(
    repo.create({
      questionId: question.id,
      title: null,
      input: attrs.input ?? '1 2',
      output: attrs.output ?? '3',
    }),
  );
}

export async function createAnswer(
  ds: DataSource,
  attrs: { question: Question; team: Team; user?: User; correct?: boolean },
): Promise<Answer> {
  const user = attrs.user ?? (await createUser(ds));
  const repo = ds.getRepository(Answer);
  return repo.save(
    repo.create({
      questionId: attrs.question.id,
      teamId: attrs.team.id,
      userId: user.id,
      content: 'print(3)',
      correct: attrs.correct ?? false,
    }),
  );
}

export async function createAnswerTestCaseResult(
  ds: DataSource,
  attrs: { answer: Answer; testCase: TestCase; output?: string; correct?: boolean },
): Promise<AnswerTestCaseResult> {
  const repo = ds.getRepository(AnswerTestCaseResult);
  return repo.save(
    repo.create({
      answerId: attrs.answer.id,
      testCaseId: attrs.testCase.id,
      output: attrs.output ?? '3',
      correct: attrs.correct ?? true,
    }),
  );
}
