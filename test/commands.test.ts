import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { COMMANDS, findCommand, getCommand, keyBindings } from '../src/commands.js';

describe('COMMANDS', () => {
  it('自動補完はメソッド補完のエンドポイントを使い、ドキュメントに書き込む', () => {
    const autofill = getCommand('autofill');
    assert.equal(autofill.operation, 'complete');
    assert.deepEqual(autofill.output, { kind: 'apply' });
  });

  it('コードを返す操作はcode形式で表示する', () => {
    assert.deepEqual(getCommand('fix').output, { kind: 'surface', format: 'code' });
    assert.deepEqual(getCommand('complete').output, { kind: 'surface', format: 'code' });
    assert.deepEqual(getCommand('explain').output, { kind: 'surface', format: 'prose' });
  });

  it('要約だけは選択範囲を必要としない', () => {
    assert.deepEqual(
      COMMANDS.filter((cmd) => !cmd.needsSelection).map((cmd) => cmd.id),
      ['summarize'],
    );
  });

  it('未知のIDはundefined', () => {
    assert.equal(findCommand('refactor'), undefined);
  });
});

describe('keyBindings', () => {
  it('デフォルトのキー割り当てを返す', () => {
    assert.deepEqual(keyBindings(), [
      { id: 'explain', key: '<leader>me' },
      { id: 'fix', key: '<leader>mf' },
      { id: 'complete', key: '<leader>mc' },
      { id: 'autofill', key: '<leader>mca' },
      { id: 'summarize', key: '<leader>ms' },
    ]);
  });

  it('設定で一部のキーを上書きできる', () => {
    const bindings = keyBindings({ fix: '<leader>F' });
    assert.deepEqual(bindings.find((b) => b.id === 'fix'), { id: 'fix', key: '<leader>F' });
    assert.deepEqual(bindings.find((b) => b.id === 'explain'), { id: 'explain', key: '<leader>me' });
  });
});
