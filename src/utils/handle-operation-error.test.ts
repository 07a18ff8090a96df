import {logCensorAndRethrow} from './handle-operation-error';
import {UnexpectedError} from '../errors/UnexpectedError';
import {Level2RowNotFound} from '../components/level2/errors/Level2RowNotFound';
import {AuditWriteFail} from '../components/level2-audit/errors/AuditWriteFail';


describe('Testing of logCensorAndRethrow function', () => {

  test('Rethrows operational errors as they are', () => {
    const err = new Level2RowNotFound();
    expect(() => logCensorAndRethrow('test operation', err)).toThrow(err);
  });

  test('Rethrows database errors as they are', () => {
    const err = new AuditWriteFail(undefined, 'relation "tbl_level2_audit" does not exist');
    expect(() => logCensorAndRethrow('test operation', err)).toThrow(AuditWriteFail);
  });

  test('Hides programmer errors behind an UnexpectedError', () => {
    const err = new TypeError('Cannot read properties of undefined');
    expect(() => logCensorAndRethrow('test operation', err)).toThrow(UnexpectedError);
    expect(() => logCensorAndRethrow('test operation', err)).toThrow('An unexpected error occurred');
  });

});
