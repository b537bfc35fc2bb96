import { ForbiddenException, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Exercise, Team, User } from '../entities';
import { ValidationFailedException } from '../common/validation';
import { createTestDataSource } from '../../test/data-source';
import { createExercise, createTeam, createUser } from '../../test/factories';
import { TeamsService } from './teams.service';

describe('TeamsService', () => {
  let ds: DataSource;
  let service: TeamsService;
  let owner: User;

  beforeEach(async () => {
    ds = await createTestDataSource();
    service = new TeamsService(
      ds.getRepository(Team),
      ds.getRepository(User),
      ds.getRepository(Exercise),
    );
    owner = await createUser(ds);
  });

  afterEach(async () => {
    await ds.destroy();
  });

  describe('create', () => {
    it('does not add the owner as a member', async () => {
      const created = await service.create(owner.id, { name: 'Red' });

      const team = await service.findOne(created.id);
      expect(team.owner.id).toBe(owner.id);
      expect(team.members).toEqual([]);
    });

    it('rejects a blank name', async () => {
      await expect(service.create(owner.id, { name: '' })).rejects.toBeInstanceOf(
        ValidationFailedException,
      );
    });
  });

  describe('findOne', () => {
    it('throws for an unknown team', async () => {
      await expect(service.findOne('00000000-0000-4000-8000-000000000000')).rejects.toThrow(
        new NotFoundException('Team not found'),
      );
    });
  });

  describe('addMember', () => {
    it('adds a member once however often it is called', async () => {
      const team = await createTeam(ds, { owner });
      const student = await createUser(ds);

      await service.addMember(team.id, owner.id, student.email);
      const updated = await service.addMember(team.id, owner.id, student.email);

      expect(updated.members.map((member) => member.id)).toEqual([student.id]);
    });

    it('is reserved to the owner', async () => {
      const team = await createTeam(ds, { owner });
      const student = await createUser(ds);

      await expect(service.addMember(team.id, student.id, student.email)).rejects.toThrow(
        new ForbiddenException('Only the team owner can do this'),
      );
    });

    it('throws for an unknown email', async () => {
      const team = await createTeam(ds, { owner });

      await expect(service.addMember(team.id, owner.id, 'nobody@example.com')).rejects.toThrow(
        'User not found',
      );
    });
  });

  describe('assignExercise', () => {
    it('assigns an exercise once', async () => {
      const team = await createTeam(ds, { owner });
      const exercise = await createExercise(ds);

      await service.assignExercise(team.id, owner.id, exercise.id);
      const updated = await service.assignExercise(team.id, owner.id, exercise.id);

      expect(updated.exercises.map((assigned) => assigned.id)).toEqual([exercise.id]);
      expect(service.hasExercise(updated, exercise.id)).toBe(true);
    });

    it('is reserved to the owner', async () => {
      const team = await createTeam(ds, { owner });
      const exercise = await createExercise(ds);

      await expect(service.assignExercise(team.id, exercise.authorId, exercise.id)).rejects.toThrow(
        'Only the team owner can do this',
      );
    });
  });

  describe('belongsTo', () => {
    it('holds for the owner and members only', async () => {
      const member = await createUser(ds);
      const outsider = await createUser(ds);
      const team = await service.findOne((await createTeam(ds, { owner, members: [member] })).id);

      expect(service.belongsTo(team, owner.id)).toBe(true);
      expect(service.belongsTo(team, member.id)).toBe(true);
      expect(service.belongsTo(team, outsider.id)).toBe(false);
    });
  });
});
