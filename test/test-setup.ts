import mock_fs from 'mock-fs';
import 'reflect-metadata';
import sinon from 'sinon';

export const mochaHooks = {
  afterEach(done: Mocha.Done): void {
    sinon.restore();
    mock_fs.restore();
    done();
  },
};
