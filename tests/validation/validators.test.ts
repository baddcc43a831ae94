import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseManifest } from '../../src/manifest/parser.js';
import { CommandValidator, commandWord } from '../../src/validation/command-validator.js';
import { manifestValidator } from '../../src/validation/manifest-validator.js';
import { findOnPath, shellValidator } from '../../src/validation/shell-validator.js';
import { makeConfig } from '../helpers/runtime-fixtures.js';

describe('manifestValidator', () => {
  const config = makeConfig('/work');

  it('fails with the load error when the manifest could not be parsed', async () => {
    const result = await manifestValidator.validate({
      config,
      pipeline: null,
      manifestError: 'Manifest circle.yml is empty',
    });
    expect(result).toEqual({ passed: false, errors: ['Manifest circle.yml is empty'], warnings: [] });
  });

  it('warns about empty phases and channels no command names', async () => {
    const pipeline = parseManifest('machine:\ntest:\n  override:\n    - cargo +stable test\n    - make\n');
    const result = await manifestValidator.validate({ config, pipeline });
    expect(result).toEqual({
      passed: true,
      errors: [],
      warnings: [
        "Phase 'machine' has no commands.",
        "No command names channel 'beta'; its replay runs only shared commands.",
      ],
    });
  });
});

describe('shellValidator', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'shell-validator-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('passes for an executable shell', async () => {
    const result = await shellValidator.validate({ config: makeConfig(dir, { shell: '/bin/sh' }), pipeline: null });
    expect(result.passed).toBe(true);
  });

  it('fails for a missing or non-executable shell', async () => {
    const notExecutable = join(dir, 'fake-shell');
    await writeFile(notExecutable, '');
    await chmod(notExecutable, 0o644);

    for (const shell of [join(dir, 'missing'), notExecutable]) {
      const result = await shellValidator.validate({ config: makeConfig(dir, { shell }), pipeline: null });
      expect(result).toEqual({ passed: false, errors: [`Shell '${shell}' not found or not executable.`], warnings: [] });
    }
  });

  it('finds bare shell names on PATH', async () => {
    const tool = join(dir, 'mysh');
    await writeFile(tool, '#!/bin/sh\n');
    await chmod(tool, 0o755);
    expect(await findOnPath('mysh', `/nonexistent:${dir}`)).toBe(tool);
    expect(await findOnPath('absent', dir)).toBeNull();
  });
});

describe('commandWord', () => {
  it('skips leading assignments', () => {
    expect(commandWord('RUST_LOG=debug CI=1 cargo test')).toBe('cargo');
    expect(commandWord('eval `ssh-agent`')).toBe('eval');
  });

  it('returns null for words it cannot check without running them', () => {
    expect(commandWord('"$HOME/bin/tool" --yes')).toBeNull();
    expect(commandWord('$(which make)')).toBeNull();
  });

  it('keeps paths', () => {
    expect(commandWord('./install.sh --yes')).toBe('./install.sh');
  });
});

describe('CommandValidator', () => {
  it('warns once per unresolvable command word, naming its first use', async () => {
    const lookup = vi.fn(async (word: string) => word !== 'cargo');
    const pipeline = parseManifest(
      'dependencies:\n  override:\n    - make deps\n    - cargo fetch\ntest:\n  override:\n    - cargo test\n',
    );

    const result = await new CommandValidator(lookup).validate({ config: makeConfig('/work'), pipeline });

    expect(lookup).toHaveBeenCalledTimes(2);
    expect(lookup).toHaveBeenCalledWith('make', '/bin/bash');
    expect(result).toEqual({
      passed: true,
      errors: [],
      warnings: ["'cargo' (first used in dependencies #1) is not on PATH; an earlier command must provide it."],
    });
  });

  it('has nothing to check without a pipeline', async () => {
    const lookup = vi.fn(async () => false);
    const result = await new CommandValidator(lookup).validate({ config: makeConfig('/work'), pipeline: null });
    expect(result.warnings).toEqual([]);
    expect(lookup).not.toHaveBeenCalled();
  });

  it('resolves shell builtins through the real shell', async () => {
    const pipeline = parseManifest('test:\n  override:\n    - cd sub\n    - phaserun-no-such-tool --flag\n');
    const result = await new CommandValidator().validate({ config: makeConfig('/work', { shell: '/bin/sh' }), pipeline });
    expect(result.warnings).toEqual([
      "'phaserun-no-such-tool' (first used in test #1) is not on PATH; an earlier command must provide it.",
    ]);
  });
});
