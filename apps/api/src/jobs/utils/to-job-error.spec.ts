import { toJobError } from './to-job-error';
import { flattenValidationErrors } from './flatten-validation-errors';
import { JobTimeoutError } from '../exceptions/job.exceptions';
import { ContractNotFoundException } from '../../contracts/exceptions/contract.exceptions';

describe('toJobError', () => {
  it('keeps the code of domain exceptions', () => {
    const error = new ContractNotFoundException('c-1');

    expect(toJobError(error)).toEqual({ code: 'NOT_FOUND', message: error.message });
  });

  it('records deadlines as JOB_TIMEOUT', () => {
    expect(toJobError(new JobTimeoutError(500))).toEqual({
      code: 'JOB_TIMEOUT',
      message: 'Job exceeded its 500 ms deadline',
    });
  });

  it('falls back to JOB_FAILED', () => {
    expect(toJobError(new Error('boom'))).toEqual({ code: 'JOB_FAILED', message: 'boom' });
    expect(toJobError('plain string')).toEqual({ code: 'JOB_FAILED', message: 'plain string' });
    expect(toJobError(new Error(''))).toEqual({ code: 'JOB_FAILED', message: 'Job failed' });
  });

  it('truncates long messages', () => {
    const { message } = toJobError(new Error('x'.repeat(5000)));

    expect(message).toHaveLength(1000);
    expect(message.endsWith('...')).toBe(true);
  });
});

describe('flattenValidationErrors', () => {
  it('prefixes nested properties with their path', () => {
    expect(
      flattenValidationErrors([
        {
          property: 'inputs',
          constraints: { isObject: 'inputs must be an object' },
          children: [
            { property: 'salary', constraints: { isInt: 'salary must be an integer' }, children: [] },
          ],
        },
      ]),
    ).toEqual(['inputs: inputs must be an object', 'inputs.salary: salary must be an integer']);
  });
});
