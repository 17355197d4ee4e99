/**
 * Workspace packaging
 *
 * The built `labelpath` bin loads the other workspaces through their
 * `main` entries, so each one must name the file its build writes.
 */

import * as fs from 'fs';
import * as path from 'path';

const ROOT = path.join(__dirname, '../../../..');
const WORKSPACES = ['packages/shared', 'packages/verifier', 'tools/labelpath-cli'];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function readJson(...segments: string[]): Record<string, unknown> {
  const parsed: unknown = JSON.parse(fs.readFileSync(path.join(ROOT, ...segments), 'utf8'));
  if (!isRecord(parsed)) {
    throw new Error(`${segments.join('/')} is not a JSON object`);
  }
  return parsed;
}

function compilerOptions(workspace: string): Record<string, unknown> {
  const options = readJson(workspace, 'tsconfig.build.json').compilerOptions;
  if (!isRecord(options)) {
    throw new Error(`${workspace}/tsconfig.build.json has no compilerOptions`);
  }
  return options;
}

describe('Workspace packaging', () => {
  it.each(WORKSPACES)('should point the main entry of %s at its build output', (workspace) => {
    // Arrange
    const manifest = readJson(workspace, 'package.json');
    const options = compilerOptions(workspace);

    // Assert
    expect(options.rootDir).toBe('src');
    expect(options.outDir).toBe('dist');
    expect(manifest.main).toBe('dist/index.js');
    expect(fs.existsSync(path.join(ROOT, workspace, 'src/index.ts'))).toBe(true);
  });

  it.each(['packages/shared', 'packages/verifier'])('should keep the types of %s on its sources', (workspace) => {
    expect(readJson(workspace, 'package.json').types).toBe('src/index.ts');
  });

  it('should resolve workspace imports to built declarations when building', () => {
    expect(compilerOptions('packages/verifier').paths).toEqual({
      '@labelpath/shared': ['../shared/dist/index'],
    });
    expect(compilerOptions('tools/labelpath-cli').paths).toEqual({
      '@labelpath/shared': ['../../packages/shared/dist/index'],
      '@labelpath/verifier': ['../../packages/verifier/dist/index'],
    });
  });

  it('should expose the built CLI as the labelpath bin', () => {
    expect(readJson('package.json').bin).toEqual({ labelpath: 'tools/labelpath-cli/dist/index.js' });
    expect(readJson('tools/labelpath-cli', 'package.json').bin).toEqual({ labelpath: 'dist/index.js' });
  });

  it('should build the workspaces in dependency order', () => {
    const scripts = readJson('package.json').scripts;

    expect(isRecord(scripts) && scripts.build).toBe(
      'npm run build -w packages/shared && npm run build -w packages/verifier && npm run build -w tools/labelpath-cli'
    );
  });
});
