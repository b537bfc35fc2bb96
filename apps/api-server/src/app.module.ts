import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AllEntities } from './entities';

// ── Feature Modules ──────────────────────────────────────────
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './users/users.module';
import { TeamsModule } from './teams/teams.module';
import { ExercisesModule } from './exercises/exercises.module';
import { QuestionsModule } from './questions/questions.module';
import { AnswersModule } from './answers/answers.module';

/**
 * AppModule – Root module composing all feature modules.
 *
 * Database Configuration:
 * - MSSQL via the mssql/tedious driver
 * - Auto-synchronize outside production (use migrations there)
 * - RequestTimeout: 30s to prevent long-running query locks
 */
@Module({
  imports: [
    // ── Global Configuration ──────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
    }),

    // ── Database ──────────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        type: 'mssql' as const,
        host: config.get<string>('MSSQL_HOST', 'localhost'),
        port: Number(config.get<number>('MSSQL_PORT', 1433)),
        username: config.get<string>('MSSQL_USER', 'sa'),
        password: config.get<string>('MSSQL_PASSWORD'),
        database: config.get<string>('MSSQL_DATABASE', 'teamgrader'),
        entities: AllEntities,
        synchronize: config.get<string>('NODE_ENV') !== 'production',
        logging: config.get<string>('NODE_ENV') === 'development',
        options: {
          encrypt: false,
          trustServerCertificate: true,
        },
        extra: {
          connectionTimeout: 30000,
          requestTimeout: 30000,
        },
        pool: {
          min: 2,
          max: 20,
        },
      }),
    }),

    // ── Authentication (exported for guards) ──────────────────
    AuthModule,
    UsersModule,

    // ── Teams & Curriculum ────────────────────────────────────
    TeamsModule,
    ExercisesModule,
    QuestionsModule,

    // ── Grading ───────────────────────────────────────────────
    AnswersModule,
  ],
})
export class AppModule {}
