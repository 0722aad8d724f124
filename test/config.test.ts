import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { writeFileSync, rmSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { DEFAULT_CONFIG, loadConfig, resolveConfig } from '../src/config.js';

const TEST_DIR = join(tmpdir(), 'snippet-assist-test-config');

function createToml(content: string, name = 'snippet-assist.toml'): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

before(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

after(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('正常なTOMLからAssistConfigを返す', () => {
    const configPath = createToml(`
base_url = "http://127.0.0.1:9000/"
timeout = 5000
spinner_enabled = false
auto_detect_language = false
language = "go"

[surface]
max_width = 80
close_keys = ["q"]

[keys]
fix = "<leader>F"
`);
    const config = loadConfig(configPath);
    assert.ok(config);
    assert.equal(config.base_url, 'http://127.0.0.1:9000');
    assert.equal(config.timeout, 5000);
    assert.equal(config.spinner_enabled, false);
    assert.equal(config.auto_detect_language, false);
    assert.equal(config.language, 'go');
    assert.equal(config.surface.max_width, 80);
    assert.equal(config.surface.width_ratio, 0.7);
    assert.deepEqual(config.surface.close_keys, ['q']);
    assert.deepEqual(config.keys, { fix: '<leader>F' });
  });

  it('存在しないファイルはnullを返す', () => {
    const result = loadConfig(join(TEST_DIR, 'nonexistent.toml'));
    assert.equal(result, null);
  });

  it('空の設定でデフォルト値を返す', () => {
    const configPath = createToml('# empty config\n');
    const config = loadConfig(configPath);
    assert.deepEqual(config, DEFAULT_CONFIG);
  });

  it('TOMLの構文エラーはnullを返す', () => {
    const configPath = createToml('base_url = \n', 'broken.toml');
    assert.equal(loadConfig(configPath), null);
  });

  it('型の合わない値はnullを返す', () => {
    const configPath = createToml('timeout = "slow"\n', 'wrong-type.toml');
    assert.equal(loadConfig(configPath), null);
  });

  it('範囲外の比率はnullを返す', () => {
    const configPath = createToml('[surface]\nwidth_ratio = 1.5\n', 'ratio.toml');
    assert.equal(loadConfig(configPath), null);
  });
});

describe('resolveConfig', () => {
  it('末尾のスラッシュを取り除く', () => {
    assert.equal(resolveConfig({ base_url: 'http://localhost:8000///' }).base_url, 'http://localhost:8000');
  });

  it('close_keysのデフォルトを共有しない', () => {
    const config = resolveConfig();
    config.surface.close_keys.push('x');
    assert.deepEqual(DEFAULT_CONFIG.surface.close_keys, ['q', '<Esc>']);
  });
});
