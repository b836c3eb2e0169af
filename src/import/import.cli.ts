import { INestApplicationContext, Logger, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from '../database/database.module';
import { ImportTarget, resolveImportTarget } from './import.config';
import { FetchError, StorageError, errorMessage } from './import.errors';
import { ImportModule } from './import.module';
import { PlayerImportService } from './player-import.service';

// Contexto sin HTTP ni cron: solo config + BD + import
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), DatabaseModule, ImportModule],
})
export class ImportCliModule {}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

const logger = new Logger('ImportCli');

export function targetOrNull(env: Record<string, string | undefined>, argv: string[]): ImportTarget | null {
  try {
    return resolveImportTarget(env, argv[0], argv[1]);
  } catch (e) {
    logger.error(errorMessage(e));
    return null;
  }
}

/**
 * Ejecuta un import ya resuelto → código de salida.
 * 0: run completo (aunque sean 0 registros). 1: FetchError, StorageError u otro fallo.
 */
export async function runCli(
  target: ImportTarget,
  importer: Pick<PlayerImportService, 'runImport'>,
): Promise<number> {
  try {
    const result = await importer.runImport(target.league, target.season);
    logger.log(
      `Imported ${target.league}/${target.season}: inserted=${result.inserted} updated=${result.updated} skipped=${result.skipped}`,
    );
    for (const reason of result.skipReasons) logger.warn(`skipped ${reason}`);
    return EXIT_OK;
  } catch (e) {
    if (e instanceof FetchError) {
      logger.error(`HTTP error while fetching data: ${e.message}`);
    } else if (e instanceof StorageError) {
      logger.error(`Database error during upsert: ${e.message}`);
    } else {
      logger.error(`Unexpected error: ${e instanceof Error ? e.stack : String(e)}`);
    }
    return EXIT_FAILURE;
  }
}

export type CliContext = Pick<INestApplicationContext, 'get' | 'close'>;

/**
 * `import [league] [season]`. La config se valida antes de abrir el contexto
 * (conexión a BD y migraciones); el contexto se cierra en todos los caminos.
 */
export async function runImportCommand(
  argv: string[],
  env: Record<string, string | undefined>,
  openContext: () => Promise<CliContext>,
): Promise<number> {
  const target = targetOrNull(env, argv);
  if (!target) return EXIT_FAILURE;

  const ctx = await openContext();
  try {
    return await runCli(target, ctx.get(PlayerImportService));
  } finally {
    await ctx.close();
  }
}
