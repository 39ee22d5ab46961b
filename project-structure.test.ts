import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const readJson = (file: string) => JSON.parse(readFileSync(file, 'utf-8')) as Record<string, unknown>;

describe('Project Structure', () => {
  const projectRoot = path.dirname(fileURLToPath(import.meta.url));

  describe('Root Configuration Files', () => {
    it('should have package.json with correct configuration', () => {
      const packageJson = readJson(path.join(projectRoot, 'package.json'));
      expect(packageJson['name']).toBe('docpipe');
      expect(packageJson['private']).toBe(true);
      expect(packageJson['workspaces']).toContain('packages/*');
    });

    it('should run the worker process from its TypeScript source', () => {
      const packageJson = readJson(path.join(projectRoot, 'package.json'));
      const scripts = packageJson['scripts'] as Record<string, string>;
      const devDependencies = packageJson['devDependencies'] as Record<string, string>;
      expect(scripts['worker']).toBe('node --import tsx packages/api/src/worker.ts');
      expect(devDependencies['tsx']).toBeDefined();
      expect(existsSync(path.join(projectRoot, 'packages', 'api', 'src', 'worker.ts'))).toBe(true);
    });

    it('should have strict TypeScript configuration', () => {
      const tsconfig = readJson(path.join(projectRoot, 'tsconfig.json'));
      expect(tsconfig['compilerOptions']).toMatchObject({ strict: true });
    });

    it('should have Vitest configuration', () => {
      expect(existsSync(path.join(projectRoot, 'vitest.config.ts'))).toBe(true);
    });
  });

  describe('Package Structure', () => {
    const packages = ['api', 'database', 'pipeline', 'shared'];

    packages.forEach((pkg) => {
      describe(`Package: ${pkg}`, () => {
        const packagePath = path.join(projectRoot, 'packages', pkg);

        it('should have package.json pointing at its sources', () => {
          const packageJson = readJson(path.join(packagePath, 'package.json'));
          expect(packageJson['name']).toBe(`@docpipe/${pkg}`);
          expect(packageJson['types']).toBe('src/index.ts');
        });

        it('should have an entry point', () => {
          expect(existsSync(path.join(packagePath, 'src', 'index.ts'))).toBe(true);
        });
      });
    });
  });
});
