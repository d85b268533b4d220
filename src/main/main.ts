import os from 'node:os';
import path from 'node:path';
import { Command, CommanderError, Option } from 'commander';
import type { UpdateCheckFrequency, UpdateChannel, UpdateSessionSnapshot } from '@shared/contracts';
import { ConfigStore, applyConfigOverrides } from '@main/services/config/ConfigStore';
import { LOG_LEVELS, Logger, UPDATE_LOG_STAGES } from '@main/services/logging/Logger';
import { describeOutcome, type InstallOrchestrator } from '@main/services/update/InstallOrchestrator';
import {
  EXIT_CODES,
  createUpdateClient,
  exitCodeForOutcome,
  resolveUpdatePlatform
} from '@main/services/update/UpdateClientFactory';
import { UpdateError, errorReason } from '@main/services/update/UpdateErrors';
import { UpdatePolicyStore } from '@main/services/update/UpdatePolicyStore';
import { VersionComparator } from '@main/services/update/VersionComparator';

const CLIENT_VERSION = '1.0.0';
const CHANNELS: UpdateChannel[] = ['stable', 'test'];
const FREQUENCIES: UpdateCheckFrequency[] = ['on-startup', 'daily', 'weekly', 'monthly', 'never'];

type GlobalOptions = {
  dataDir: string;
  currentVersion?: string;
  installDir?: string;
  platform?: string;
  verbose?: boolean;
  format: 'human' | 'json';
};

interface Runtime {
  logger: Logger;
  policyStore: UpdatePolicyStore;
  configStore: ConfigStore;
}

class UsageError extends Error {}

const program = new Command();

program.exitOverride((error: CommanderError) => {
  process.exit(error.exitCode === 0 ? EXIT_CODES.OK : EXIT_CODES.INVALID_ARGUMENTS);
});

program
  .name('update-client')
  .description('Cliente de auto-update: verifica, baixa, valida e instala novas versoes')
  .version(CLIENT_VERSION)
  .option('--data-dir <path>', 'Diretorio de dados do cliente', path.join(os.homedir(), '.update-client'))
  .option('--current-version <version>', 'Versao instalada do aplicativo')
  .option('--install-dir <path>', 'Diretorio de instalacao do aplicativo')
  .option('--platform <platform>', 'Plataforma: macos|windows|linux (padrao: deteccao automatica)')
  .option('--verbose', 'Espelha o log em stderr')
  .addOption(new Option('--format <format>', 'Formato de saida').choices(['human', 'json']).default('human'));

program
  .command('check')
  .description('Verifica se existe update elegivel no feed')
  .option('--if-due', 'So verifica se a frequencia configurada permitir')
  .action(async (opts: { ifDue?: boolean }, command: Command) =>
    runAction(command, async (globals, runtime) => {
      const orchestrator = buildOrchestrator(globals, runtime);
      const session = opts.ifDue ? await orchestrator.checkIfDue() : await orchestrator.checkNow();
      printSession(globals, session);
      return exitCodeForOutcome(describeOutcome(session));
    })
  );

program
  .command('update')
  .description('Verifica, baixa, valida e instala o update disponivel')
  .action(async (_opts: Record<string, never>, command: Command) =>
    runAction(command, async (globals, runtime) => {
      const orchestrator = buildOrchestrator(globals, runtime);
      return runUpdateCycle(globals, runtime, orchestrator);
    })
  );

program
  .command('status')
  .description('Mostra a politica de update e as ultimas entradas de log')
  .option('--limit <n>', 'Quantidade de entradas de log', '20')
  .addOption(new Option('--stage <stage>', 'Mostra apenas uma etapa do ciclo de update').choices(UPDATE_LOG_STAGES))
  .addOption(new Option('--level <level>', 'Nivel minimo das entradas').choices(LOG_LEVELS))
  .action(async (opts: { limit: string; stage?: string; level?: string }, command: Command) =>
    runAction(command, async (globals, runtime) => {
      const limit = Number(opts.limit);
      if (!Number.isInteger(limit) || limit <= 0) {
        throw new UsageError(`--limit invalido: ${opts.limit}`);
      }

      const policy = runtime.policyStore.get();
      const entries = runtime.logger.entries(limit, {
        stage: UPDATE_LOG_STAGES.find((stage) => stage === opts.stage),
        minLevel: LOG_LEVELS.find((level) => level === opts.level)
      });
      if (globals.format === 'json') {
        process.stdout.write(`${JSON.stringify({ policy, config: runtime.configStore.get(), entries })}\n`);
        return EXIT_CODES.OK;
      }

      process.stdout.write(
        [
          `Canal: ${policy.channel}`,
          `Frequencia: ${policy.checkFrequency}`,
          `Ultima verificacao: ${policy.lastCheckAt ?? 'nunca'} (${policy.lastCheckResult ?? '-'})`,
          `Versoes ignoradas: ${policy.ignoredVersions.length > 0 ? policy.ignoredVersions.join(', ') : '-'}`,
          ''
        ].join('\n')
      );
      for (const entry of entries) {
        process.stdout.write(`${entry.ts} [${entry.level}] ${entry.message}\n`);
      }
      return EXIT_CODES.OK;
    })
  );

program
  .command('policy')
  .description('Altera canal, frequencia e versoes ignoradas')
  .addOption(new Option('--channel <channel>', 'Canal de update').choices(CHANNELS))
  .addOption(new Option('--frequency <frequency>', 'Frequencia de verificacao').choices(FREQUENCIES))
  .option('--ignore <version>', 'Ignora uma versao especifica')
  .option('--unignore <version>', 'Volta a oferecer uma versao ignorada')
  .action(
    async (
      opts: { channel?: string; frequency?: string; ignore?: string; unignore?: string },
      command: Command
    ) =>
      runAction(command, async (globals, runtime) => {
        const comparator = new VersionComparator();
        for (const version of [opts.ignore, opts.unignore]) {
          if (version !== undefined && !comparator.tryParse(version)) {
            throw new UsageError(`Versao invalida: ${version}`);
          }
        }

        let policy = runtime.policyStore.set({
          channel: CHANNELS.find((item) => item === opts.channel),
          checkFrequency: FREQUENCIES.find((item) => item === opts.frequency)
        });
        if (opts.ignore) {
          policy = runtime.policyStore.ignoreVersion(opts.ignore);
        }
        if (opts.unignore) {
          policy = runtime.policyStore.unignoreVersion(opts.unignore);
        }

        runtime.logger.info('update.policy.updated', {
          channel: policy.channel,
          checkFrequency: policy.checkFrequency,
          ignoredVersions: policy.ignoredVersions
        });
        process.stdout.write(
          globals.format === 'json'
            ? `${JSON.stringify(policy)}\n`
            : `Canal: ${policy.channel}; frequencia: ${policy.checkFrequency}; ignoradas: ${policy.ignoredVersions.join(', ') || '-'}\n`
        );
        return EXIT_CODES.OK;
      })
  );

async function runUpdateCycle(globals: GlobalOptions, runtime: Runtime, orchestrator: InstallOrchestrator): Promise<number> {
  const onSigint = () => {
    if (!orchestrator.cancel()) {
      process.stderr.write('Cancelamento indisponivel nesta etapa.\n');
    }
  };
  const unsubscribe = orchestrator.subscribe((event) => {
    if (event.type === 'progress' && globals.format === 'human') {
      process.stderr.write(`\rBaixando... ${Math.round(event.fraction * 100)}%`);
    }
  });
  process.on('SIGINT', onSigint);

  try {
    let session = await orchestrator.checkNow();
    if (session.state === 'update-available') {
      printSession(globals, session);
      session = await orchestrator.downloadUpdate();
      if (globals.format === 'human') {
        process.stderr.write('\n');
      }
    }

    if (session.state === 'verified') {
      const result = await orchestrator.installUpdate();
      session = result.session;
      runtime.logger.info('update.cli.install_result', { ok: result.ok, message: result.message });
      if (globals.format === 'human') {
        (result.ok ? process.stdout : process.stderr).write(`${result.message}\n`);
      }
    }

    printSession(globals, session);
    return exitCodeForOutcome(describeOutcome(session));
  } finally {
    process.off('SIGINT', onSigint);
    unsubscribe();
  }
}

async function runAction(
  command: Command,
  action: (globals: GlobalOptions, runtime: Runtime) => Promise<number>
): Promise<void> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  let runtime: Runtime;
  try {
    runtime = createRuntime(globals);
  } catch (error) {
    process.stderr.write(`Falha ao preparar o cliente: ${errorReason(error)}\n`);
    process.exitCode = EXIT_CODES.MANUAL_REMEDIATION;
    return;
  }

  try {
    process.exitCode = await action(globals, runtime);
  } catch (error) {
    runtime.logger.error('update.cli.error', { command: command.name(), reason: errorReason(error) });
    process.stderr.write(`${errorReason(error)}\n`);
    process.exitCode = exitCodeForError(error);
  }
}

function createRuntime(globals: GlobalOptions): Runtime {
  const dataDir = path.resolve(globals.dataDir);
  return {
    logger: new Logger(dataDir, {
      mirrorFilePath: process.env.UPDATE_CLIENT_LOG_MIRROR_PATH?.trim() || null,
      minLevel: globals.verbose ? 'debug' : 'info',
      consoleStream: globals.verbose ? process.stderr : null
    }),
    policyStore: new UpdatePolicyStore(dataDir),
    configStore: new ConfigStore(dataDir)
  };
}

function buildOrchestrator(globals: GlobalOptions, runtime: Runtime): InstallOrchestrator {
  if (!globals.currentVersion) {
    throw new UsageError('Informe --current-version.');
  }
  if (!globals.installDir) {
    throw new UsageError('Informe --install-dir.');
  }

  const platform = resolveUpdatePlatform(globals.platform);
  if (!platform) {
    throw new UsageError(`Plataforma nao suportada: ${globals.platform ?? process.platform}`);
  }

  const config = applyConfigOverrides(runtime.configStore.get(), {
    feedBaseUrl: process.env.UPDATE_CLIENT_FEED_URL?.trim() || undefined,
    requestTimeoutMs: readPositiveIntEnv('UPDATE_CLIENT_TIMEOUT_MS'),
    maxAttempts: readPositiveIntEnv('UPDATE_CLIENT_DOWNLOAD_ATTEMPTS')
  });

  try {
    return createUpdateClient({
      dataDir: path.resolve(globals.dataDir),
      installDir: path.resolve(globals.installDir),
      currentVersion: globals.currentVersion,
      platform,
      config,
      logger: runtime.logger,
      policy: runtime.policyStore,
      userAgent: `UpdateClient/${CLIENT_VERSION}`,
      exitCurrentApp: () => runtime.logger.info('update.cli.handoff', { platform })
    });
  } catch (error) {
    throw new UsageError(errorReason(error));
  }
}

function printSession(globals: GlobalOptions, session: UpdateSessionSnapshot): void {
  const outcome = describeOutcome(session);
  if (globals.format === 'json') {
    process.stdout.write(`${JSON.stringify({ outcome, session })}\n`);
    return;
  }

  switch (session.state) {
    case 'update-available':
      process.stdout.write(
        `Update disponivel: ${session.candidate?.displayVersion ?? '-'} (${session.candidate?.downloadUrl ?? '-'})\n`
      );
      return;
    case 'failed':
      process.stderr.write(
        `${outcome === 'manual-remediation' ? 'Falha (requer acao manual)' : 'Falha (pode tentar novamente)'}: ${
          session.error?.message ?? 'erro desconhecido'
        }\n`
      );
      return;
    case 'cancelled':
      process.stderr.write('Operacao cancelada.\n');
      return;
    case 'idle':
      if (session.upToDate) {
        process.stdout.write('Aplicativo atualizado.\n');
      }
      return;
    default:
      process.stdout.write(`Estado: ${session.state}\n`);
  }
}

function exitCodeForError(error: unknown): number {
  if (error instanceof UsageError) {
    return EXIT_CODES.INVALID_ARGUMENTS;
  }
  if (error instanceof UpdateError) {
    return error.retryable ? EXIT_CODES.RETRYABLE_FAILURE : EXIT_CODES.MANUAL_REMEDIATION;
  }
  return EXIT_CODES.MANUAL_REMEDIATION;
}

function readPositiveIntEnv(envName: string): number | undefined {
  const raw = process.env[envName]?.trim();
  if (!raw) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  return Math.trunc(value);
}

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${errorReason(error)}\n`);
  process.exitCode = EXIT_CODES.MANUAL_REMEDIATION;
});
