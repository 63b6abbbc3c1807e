import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { FreezeConfigInput } from '../config';
import type { Logger } from '../logger';
import type { ParsedUnit, UnitParser } from './parser';

import { resolveConfig } from '../config';
import { ResolutionFailureError, isFreezeError } from '../errors';
import { silentLogger } from '../logger';
import { reflectValue } from '../reflect';
import { formatGenerateSummary, reportUnitFailure } from '../report';
import { renderModule } from '../codegen/render';
import {
  GENERATED_HEADER,
  buildImportsModule,
  buildUnitModule
} from '../codegen/unit-module';
import { walkDirectories } from './walk';

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

/**
 * Picks the single unit of a directory.
 *
 * @returns The unit, or undefined for a directory without one.
 * @throws ResolutionFailureError
 *   When the directory holds several units, or the unit has errors.
 */
function selectUnit(
  dir: string,
  units: readonly ParsedUnit[]
): ParsedUnit | undefined {
  if (units.length === 0) return undefined;

  if (units.length > 1) {
    const names = units.map(unit => unit.name).join(', ');
    throw new ResolutionFailureError(
      `found multiple packages in the same directory: ${dir} packages [${names}]`
    );
  }

  const [unit] = units;
  const [firstError] = unit.errors ?? [];
  if (firstError !== undefined) {
    throw new ResolutionFailureError(
      `failed to parse package "${unit.name}": ${firstError}`
    );
  }

  return unit;
}

/**
 * Module specifier that loads the generated module of `relativePath`.
 *
 * - with a package name: `my-pkg/sub/dir/frozen.gen.js`
 * - without: `./sub/dir/frozen.gen.js`
 */
export function unitSpecifier(
  packageName: string,
  relativePath: string,
  outputFile: string
): string {
  const local = path.posix.join(relativePath, outputFile);
  return packageName ? path.posix.join(packageName, local) : `./${local}`;
}

/**
 * Freezes every unit below `rootDir`.
 *
 * Steps:
 * 1. Walk the tree (parents before children, names sorted, `exclude`d
 *    directories skipped) and ask `parser` for the units of each directory.
 * 2. Freeze the unit of a directory into `<dir>/<outputFile>`; it registers
 *    itself under its path relative to the root.
 * 3. Write `<rootDir>/<importFile>`, importing every generated module except
 *    the root's own.
 *
 * The first failure aborts the run; files written before it stay on disk.
 *
 * @returns Paths of the written files, in write order.
 */
export async function generate(
  input: FreezeConfigInput,
  parser: UnitParser,
  logger: Logger = silentLogger
): Promise<string[]> {
  const config = resolveConfig(input);
  const writtenFiles: string[] = [];
  const specifiers: string[] = [];
  let skippedDirectories = 0;

  for await (const dir of walkDirectories(config.rootDir, config)) {
    const relativePath = toPosix(path.relative(config.rootDir, dir));
    const unit = selectUnit(
      dir,
      await parser.parseDir(dir, { rootDir: config.rootDir, relativePath })
    );

    if (!unit) {
      skippedDirectories++;
      logger.debug(`No unit in "${dir}"`);
      continue;
    }

    let source: string;
    try {
      const program = buildUnitModule(
        { path: relativePath, value: reflectValue(unit.value, unit.type) },
        config
      );
      source = renderModule(program, { header: GENERATED_HEADER });
    } catch (error) {
      if (isFreezeError(error)) reportUnitFailure(dir, error, error.code);
      throw error;
    }

    const file = path.join(dir, config.outputFile);
    await writeFile(file, source, 'utf8');
    writtenFiles.push(file);
    logger.info(`Froze "${unit.name}" into ${file}`);

    if (relativePath !== '') {
      specifiers.push(
        unitSpecifier(config.packageName, relativePath, config.outputFile)
      );
    }
  }

  const importFile = path.join(config.rootDir, config.importFile);
  await writeFile(
    importFile,
    renderModule(buildImportsModule(specifiers), { header: GENERATED_HEADER }),
    'utf8'
  );
  writtenFiles.push(importFile);

  logger.info(formatGenerateSummary({ writtenFiles, skippedDirectories }));
  return writtenFiles;
}

export type { ParsedUnit, UnitContext, UnitParser } from './parser';
export { isUnitParser } from './parser';
export { walkDirectories } from './walk';
