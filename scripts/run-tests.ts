import { existsSync, readdirSync } from 'node:fs';
import { join, relative, resolve } from 'node:path';
import { spawnSync } from 'node:child_process';

const projectRoot = process.cwd();
// `npm test -- token idle` runs only the files whose path contains a filter.
const filters = process.argv.slice(2);

const listTestFiles = (rootDir: string): string[] => {
  const absoluteRoot = resolve(projectRoot, rootDir);
  if (!existsSync(absoluteRoot)) {
    return [];
  }

  const files: string[] = [];
  const pending: string[] = [absoluteRoot];

  for (let directory = pending.pop(); directory !== undefined; directory = pending.pop()) {
    for (const entry of readdirSync(directory, { withFileTypes: true })) {
      const fullPath = join(directory, entry.name);
      if (entry.isDirectory() && entry.name !== 'support') {
        pending.push(fullPath);
      } else if (entry.isFile() && entry.name.endsWith('.test.ts')) {
        files.push(relative(projectRoot, fullPath));
      }
    }
  }

  return files;
};

const testFiles = listTestFiles('src')
  .filter((file) => filters.length === 0 || filters.some((filter) => file.includes(filter)))
  .sort((left, right) => left.localeCompare(right));

if (testFiles.length === 0) {
  console.error(filters.length > 0 ? `No test files match ${filters.join(', ')}` : 'No test files found');
  process.exit(1);
}

const tsxBin = resolve(projectRoot, 'node_modules', '.bin', process.platform === 'win32' ? 'tsx.cmd' : 'tsx');

if (!existsSync(tsxBin)) {
  console.error(`Missing tsx binary at ${tsxBin}`);
  process.exit(1);
}

const failedFiles: string[] = [];

for (const file of testFiles) {
  console.log(`\nRUN ${file}`);
  const result = spawnSync(tsxBin, [file], { cwd: projectRoot, stdio: 'inherit' });
  if (result.error) {
    console.error(result.error);
    process.exit(1);
  }
  if (result.status !== 0) {
    failedFiles.push(result.status === null ? `${file} (${result.signal ?? 'no status'})` : file);
  }
}

console.log(`\nExecuted ${testFiles.length} test files.`);
if (failedFiles.length > 0) {
  console.error(`Failing test files:\n  ${failedFiles.join('\n  ')}`);
  process.exit(1);
}
