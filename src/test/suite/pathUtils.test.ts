import * as assert from 'assert';
import * as path from 'path';
import { localPath, safe } from '../../utils/pathUtils';

suite('pathUtil Test Suite', () => {

  test('safe() replaces illegal characters', () => {
    const unsafe = 'some<>:"/\\|?*name';
    const expected = 'some_________name'; // 9 characters replaced
    assert.strictEqual(safe(unsafe), expected);
  });

  test('safe() leaves safe names untouched', () => {
    const name = 'normal_name';
    assert.strictEqual(safe(name), name);
  });

  test('safe() guards reserved and dot-only names', () => {
    assert.strictEqual(safe('CON'), '_CON');
    assert.strictEqual(safe('..'), '_');
  });

  test('localPath() sanitises every segment', () => {
    assert.strictEqual(
      localPath('/mirror', 'docs/My File?.pdf'),
      path.join('/mirror', 'docs', 'My File_.pdf'),
    );
    assert.strictEqual(localPath('/mirror', 'img/'), path.join('/mirror', 'img'));
    assert.strictEqual(localPath('/mirror', '../etc/passwd'), path.join('/mirror', '_', 'etc', 'passwd'));
  });

});
