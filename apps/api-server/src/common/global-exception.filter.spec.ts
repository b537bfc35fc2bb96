import {
  BadRequestException,
  HttpException,
  HttpStatus,
  NotFoundException,
} from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { GlobalExceptionFilter } from './global-exception.filter';
import { ValidationFailedException } from './validation';

describe('GlobalExceptionFilter', () => {
  const filter = new GlobalExceptionFilter();

  describe('toErrorBody', () => {
    it('hides the message of unexpected errors', () => {
      const body = filter.toErrorBody(new Error('connection reset'), '/api/v1/teams');

      expect(body).toMatchObject({
        statusCode: 500,
        errorCode: 'INTERNAL_ERROR',
        message: 'Internal server error',
        path: '/api/v1/teams',
      });
      expect(body.errors).toBeUndefined();
    });

    it('names the status when the exception carries a plain string', () => {
      const body = filter.toErrorBody(new HttpException('Gone for good', HttpStatus.GONE), '/x');

      expect(body).toMatchObject({ statusCode: 410, errorCode: 'GONE', message: 'Gone for good' });
    });

    it('keeps the message and error of built-in exceptions', () => {
      const body = filter.toErrorBody(new NotFoundException('Team not found'), '/x');

      expect(body).toMatchObject({ statusCode: 404, errorCode: 'Not Found', message: 'Team not found' });
    });

    it('joins message lists', () => {
      const exception = new BadRequestException({
        statusCode: 400,
        message: ['name should not be empty', 'teamId must be a UUID'],
        error: 'Bad Request',
      });

      expect(filter.toErrorBody(exception, '/x').message).toBe(
        'name should not be empty; teamId must be a UUID',
      );
    });

    it('passes field-keyed violations through', () => {
      const body = filter.toErrorBody(
        new ValidationFailedException({ email: ['is invalid', 'has already been taken'] }),
        '/api/v1/auth/register',
      );

      expect(body).toMatchObject({
        statusCode: 422,
        errorCode: 'VALIDATION_FAILED',
        message: 'Validation failed',
        errors: { email: ['is invalid', 'has already been taken'] },
      });
    });
  });

  describe('catch', () => {
    it('writes the body with its status code', () => {
      const response = { status: jest.fn().mockReturnThis(), json: jest.fn() };
      const request = { url: '/api/v1/questions/q1', method: 'GET' };
      jest.spyOn(filter['logger'], 'warn').mockImplementation(() => undefined);

      filter.catch(new NotFoundException('Question not found'), new ExecutionContextHost([request, response]));

      expect(response.status).toHaveBeenCalledWith(404);
      expect(response.json).toHaveBeenCalledWith(
        expect.objectContaining({ message: 'Question not found', path: '/api/v1/questions/q1' }),
      );
    });
  });
});
