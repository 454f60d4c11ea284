import path from 'path';
import { setTimeout as delay } from 'timers/promises';
import pidusage from 'pidusage';
import YAML from 'yaml';
import yargs from 'yargs';
import type { ConfigFormat } from '../db/appConfig.js';
import type { RuntimeState } from '../db/runtimeStateRepository.js';
import { profileConfigFromServer } from '../services/config/backendConfig.js';
import debugLogger from '../services/debugLogger.js';
import { describeReconnectEvent } from '../services/monitoring/events.js';
import { parseShareLink } from '../services/shareLinks.js';
import type { ProcessStats } from '../services/xrayManager.js';
import { CHAINABLE_PROTOCOLS } from '../types/models.js';
import type { ConnectionMode, Network, Profile, RoutingBucket, RoutingToggles, ServerDefinition } from '../types/models.js';
import { ROUTING_COUNTRIES } from '../db/settingsRepository.js';
import { ValidationError, formatBytes, validatePort } from '../utils/validators.js';
import type { AppContainer } from './container.js';

export class CliError extends Error {
  constructor(message: string, readonly exitCode = 1) {
    super(message);
    this.name = 'CliError';
  }
}

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export type SessionSignal = 'stop' | 'restart';

export interface ProcessControl {
  isAlive(pid: number): boolean;
  signal(pid: number, signal: NodeJS.Signals): void;
  stats(pid: number): Promise<ProcessStats>;
}

export interface CliDeps {
  container: AppContainer;
  io?: CliIO;
  processControl?: ProcessControl;
  /** Resolves when the foreground session should stop or restart. */
  waitForSignal?: () => Promise<SessionSignal>;
  sleep?: (ms: number) => Promise<void>;
  pid?: number;
  stopTimeoutMs?: number;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
};

export const systemProcessControl: ProcessControl = {
  isAlive(pid) {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      return error instanceof Error && 'code' in error && error.code === 'EPERM';
    }
  },
  signal(pid, signal) {
    process.kill(pid, signal);
  },
  stats: pid => pidusage(pid),
};

/** SIGINT and SIGTERM stop the session, SIGHUP restarts it. */
export const waitForProcessSignal = (): Promise<SessionSignal> =>
  new Promise(resolve => {
    const finish = (signal: SessionSignal) => {
      process.off('SIGINT', onStop);
      process.off('SIGTERM', onStop);
      process.off('SIGHUP', onRestart);
      resolve(signal);
    };
    const onStop = () => finish('stop');
    const onRestart = () => finish('restart');
    process.on('SIGINT', onStop);
    process.on('SIGTERM', onStop);
    process.on('SIGHUP', onRestart);
  });

const NETWORKS: readonly Network[] = ['tcp', 'ws', 'grpc', 'h2'];
const MODES: readonly ConnectionMode[] = ['proxy', 'vpn'];
const FORMATS: readonly ConfigFormat[] = ['json', 'yaml'];
const BUCKETS: readonly RoutingBucket[] = ['direct', 'proxy', 'block'];
const TOGGLES: ReadonlyArray<keyof RoutingToggles> = ['block_udp_443', 'block_ads', 'direct_private_ips', 'direct_local_domains'];

type StartTarget =
  | { kind: 'server'; server: ServerDefinition }
  | { kind: 'profile'; profile: Profile }
  | { kind: 'file'; filePath: string };

interface StartArgs {
  mode?: ConnectionMode;
  profile?: string;
  file?: string;
}

const describeTarget = (target: StartTarget): { id: string; name: string } => {
  switch (target.kind) {
    case 'server':
      return { id: target.server.id, name: target.server.name };
    case 'profile':
      return { id: target.profile.id, name: target.profile.name };
    case 'file':
      return { id: target.filePath, name: path.basename(target.filePath) };
  }
};

const formatValue = (value: unknown): string => (typeof value === 'string' ? value : JSON.stringify(value, null, 2));

/** Config key served by the settings store rather than `config.json`. */
const PORT_KEY = 'inbound.port';

const parseValue = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
};

/**
 * Runs one command line and resolves with the process exit code. Never
 * exits the process itself.
 */
export const runCli = async (argv: string[], deps: CliDeps): Promise<number> => {
  const { container } = deps;
  const io = deps.io ?? consoleIO;
  const pc = deps.processControl ?? systemProcessControl;
  const waitForSignal = deps.waitForSignal ?? waitForProcessSignal;
  const sleep = deps.sleep ?? (ms => delay(ms));
  const ownPid = deps.pid ?? process.pid;
  const stopTimeoutMs = deps.stopTimeoutMs ?? 10_000;

  let exitCode = 0;

  const run = async (action: () => Promise<void> | void): Promise<void> => {
    try {
      await action();
    } catch (error) {
      exitCode = error instanceof CliError ? error.exitCode : 1;
      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof CliError) {
        io.err(message);
      } else if (error instanceof ValidationError) {
        io.err(`✗ ${message}`);
      } else {
        debugLogger.error('CLI', 'Command failed', { error: message });
        io.err(`✗ Error: ${message}`);
      }
    }
  };

  const liveSession = (): RuntimeState | null => {
    const state = container.runtimeState.load();
    if (!state) {
      return null;
    }
    if (!pc.isAlive(state.pid)) {
      container.runtimeState.clear();
      return null;
    }
    return state;
  };

  // ---------------------------------------------------------------------------
  // start / stop / restart / status
  // ---------------------------------------------------------------------------

  const resolveTarget = (args: StartArgs): StartTarget => {
    if (args.file) {
      return { kind: 'file', filePath: path.resolve(args.file) };
    }
    if (args.profile) {
      const entry = container.resolver.resolve(args.profile);
      if (!entry) {
        throw new CliError(`✗ Profile '${args.profile}' not found`);
      }
      if (entry.kind === 'chain') {
        throw new CliError(`✗ '${args.profile}' is a chain; start one of its profiles instead`);
      }
      return { kind: 'profile', profile: entry.profile };
    }
    const server = container.servers.getActiveServer();
    if (!server) {
      throw new CliError("Error: No active server configured. Use 'xenray server set <id>' first.");
    }
    return { kind: 'server', server };
  };

  const connectTarget = async (target: StartTarget, mode: ConnectionMode): Promise<boolean> => {
    switch (target.kind) {
      case 'server':
        return container.connection.connectServer(target.server, mode);
      case 'profile': {
        const ok = await container.connection.connectProfileConfig(target.profile.config, mode);
        if (ok) container.settings.setLastSelectedProfileId(target.profile.id);
        return ok;
      }
      case 'file': {
        const ok = await container.connection.connect(target.filePath, mode);
        if (ok) container.recentFiles.add(target.filePath);
        return ok;
      }
    }
  };

  const publishSession = (target: StartTarget, mode: ConnectionMode): void => {
    const { id, name } = describeTarget(target);
    container.runtimeState.save({
      pid: ownPid,
      xray_pid: container.xray.getPid(),
      server_id: id,
      server_name: name,
      mode,
      started_at: new Date().toISOString(),
    });
  };

  const startSession = async (args: StartArgs): Promise<void> => {
    const existing = liveSession();
    if (existing) {
      throw new CliError(`✗ xenray is already running (pid ${existing.pid})`);
    }

    const mode = args.mode ?? container.settings.getConnectionMode();
    let target = resolveTarget(args);
    if (!(await connectTarget(target, mode))) {
      throw new CliError('✗ Failed to start Xray');
    }

    publishSession(target, mode);
    const inbound = container.getInbound();
    io.out('✓ Xray started successfully');
    io.out(`  Server: ${describeTarget(target).name}`);
    io.out(`  Listening: ${inbound.protocol}://${inbound.listen}:${inbound.port}`);
    io.out(`  Mode: ${mode}`);

    const unsubscribe = container.connection.onEvent(event => io.out(`  ${describeReconnectEvent(event)}`));
    try {
      for (;;) {
        const signal = await waitForSignal();
        await container.connection.disconnect();
        if (signal === 'stop') {
          io.out('✓ Xray stopped');
          return;
        }

        target = resolveTarget(args);
        if (!(await connectTarget(target, mode))) {
          throw new CliError('✗ Failed to restart Xray');
        }
        publishSession(target, mode);
        io.out(`✓ Xray restarted (${describeTarget(target).name})`);
      }
    } finally {
      unsubscribe();
      container.runtimeState.clear();
    }
  };

  const stopSession = async (): Promise<void> => {
    const state = liveSession();
    if (!state) {
      throw new CliError('✗ Xray is not running');
    }

    pc.signal(state.pid, 'SIGTERM');
    const pollMs = 100;
    for (let waited = 0; waited < stopTimeoutMs; waited += pollMs) {
      if (!pc.isAlive(state.pid)) {
        container.runtimeState.clear();
        io.out('✓ Xray stopped');
        return;
      }
      await sleep(pollMs);
    }
    throw new CliError(`✗ Failed to stop Xray (pid ${state.pid})`);
  };

  const restartSession = async (args: StartArgs): Promise<void> => {
    const state = liveSession();
    if (state) {
      pc.signal(state.pid, 'SIGHUP');
      io.out(`✓ Restart requested (pid ${state.pid})`);
      return;
    }
    await startSession(args);
  };

  const showStatus = async (): Promise<void> => {
    const state = liveSession();
    if (!state) {
      io.out('Status: stopped');
      return;
    }

    io.out('Status: running');
    io.out(`  Server: ${state.server_name} (${state.server_id})`);
    io.out(`  Mode: ${state.mode}`);
    io.out(`  Session PID: ${state.pid}`);
    io.out(`  Started: ${state.started_at}`);
    if (state.xray_pid !== null) {
      io.out(`  Xray PID: ${state.xray_pid}`);
      try {
        const stats = await pc.stats(state.xray_pid);
        io.out(`  CPU: ${stats.cpu.toFixed(1)}%`);
        io.out(`  Memory: ${formatBytes(stats.memory)}`);
      } catch (error) {
        debugLogger.debug('CLI', 'Process metrics unavailable', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  };

  // ---------------------------------------------------------------------------
  // servers
  // ---------------------------------------------------------------------------

  const listServers = (): void => {
    const servers = container.servers.listServers();
    if (servers.length === 0) {
      io.out('No servers configured');
      return;
    }
    const activeId = container.appConfig.getActiveServerId();
    for (const server of servers) {
      const marker = server.id === activeId ? '*' : ' ';
      io.out(`${marker} ${server.id}  ${server.name}  ${server.protocol}://${server.address}:${server.port}`);
    }
  };

  // ---------------------------------------------------------------------------
  // command tree
  // ---------------------------------------------------------------------------

  const modeOption = {
    type: 'string',
    choices: MODES,
    describe: 'Connection mode (defaults to the saved setting)',
  } as const;

  await yargs(argv)
    .scriptName('xenray')
    .exitProcess(false)
    .strict()
    .option('verbose', { type: 'boolean', global: true, default: false, describe: 'Echo log messages to the console' })
    .middleware(args => {
      debugLogger.setConsoleEnabled(args.verbose);
    })
    .command(
      'start',
      'Start the active server in the foreground',
      builder =>
        builder
          .option('mode', modeOption)
          .option('profile', { type: 'string', describe: 'Start a stored profile instead of the active server' })
          .option('file', { type: 'string', describe: 'Start from an Xray JSON file' })
          .conflicts('profile', 'file'),
      args => run(() => startSession(args)),
    )
    .command('stop', 'Stop the running session', () => undefined, () => run(stopSession))
    .command(
      'restart',
      'Restart the running session, or start one',
      builder => builder.option('mode', modeOption),
      args => run(() => restartSession(args)),
    )
    .command('status', 'Show whether Xray is running', () => undefined, () => run(showStatus))
    .command('server', 'Manage servers', builder =>
      builder
        .command('list', 'List servers', () => undefined, () => run(listServers))
        .command(
          'add',
          'Add a server',
          b =>
            b
              .option('id', { type: 'string', demandOption: true })
              .option('name', { type: 'string', demandOption: true })
              .option('address', { type: 'string', demandOption: true })
              .option('port', { type: 'number', demandOption: true })
              .option('protocol', { type: 'string', choices: CHAINABLE_PROTOCOLS, default: 'vless' as const })
              .option('uuid', { type: 'string' })
              .option('password', { type: 'string' })
              .option('network', { type: 'string', choices: NETWORKS, default: 'tcp' as const })
              .option('tls', { type: 'string', choices: ['none', 'tls'] as const, default: 'none' as const })
              .option('sni', { type: 'string' }),
          args =>
            run(() => {
              const server: ServerDefinition = {
                id: args.id,
                name: args.name,
                protocol: args.protocol,
                address: args.address,
                port: args.port,
                network: args.network,
                tls: args.tls,
              };
              if (args.uuid) server.uuid = args.uuid;
              if (args.password) server.password = args.password;
              if (args.sni) server.sni = args.sni;
              if (!container.servers.addServer(server)) {
                throw new CliError(`✗ Failed to save server '${args.id}'`);
              }
              io.out(`✓ Server '${args.name}' added`);
            }),
        )
        .command(
          'remove <id>',
          'Remove a server',
          b => b.positional('id', { type: 'string', demandOption: true }),
          args =>
            run(() => {
              if (!container.servers.removeServer(args.id)) {
                throw new CliError(`✗ Server '${args.id}' not found`);
              }
              io.out(`✓ Server '${args.id}' removed`);
            }),
        )
        .command(
          'set <id>',
          'Set the active server',
          b => b.positional('id', { type: 'string', demandOption: true }),
          args =>
            run(() => {
              if (!container.servers.setActiveServer(args.id)) {
                throw new CliError(`✗ Server '${args.id}' not found`);
              }
              io.out(`✓ Active server set to '${args.id}'`);
            }),
        )
        .command(
          'import <link>',
          'Add a server from a share link',
          b => b.positional('link', { type: 'string', demandOption: true }).option('id', { type: 'string' }),
          args =>
            run(() => {
              const server = container.servers.importFromLink(args.link, args.id);
              io.out(`✓ Imported server '${server.name}' (${server.id})`);
            }),
        )
        .command(
          'export <id>',
          'Print a server as a share link',
          b => b.positional('id', { type: 'string', demandOption: true }),
          args =>
            run(() => {
              const link = container.servers.exportLink(args.id);
              if (!link) {
                throw new CliError(`✗ Server '${args.id}' not found`);
              }
              io.out(link);
            }),
        )
        .demandCommand(1, 'Specify a server command'),
    )
    .command('config', 'Show, edit, import or export the configuration', builder =>
      builder
        .command(
          'show',
          'Print the configuration',
          b => b.option('format', { type: 'string', choices: FORMATS, default: 'json' as const }),
          args =>
            run(() => {
              const document = container.appConfig.toJSON();
              io.out(args.format === 'yaml' ? YAML.stringify(document).trimEnd() : JSON.stringify(document, null, 2));
            }),
        )
        .command(
          'get <key>',
          'Print one value (dot notation)',
          b => b.positional('key', { type: 'string', demandOption: true }),
          args =>
            run(() => {
              const value = args.key === PORT_KEY ? container.settings.getProxyPort() : container.appConfig.get(args.key);
              if (value === undefined) {
                throw new CliError(`✗ Key '${args.key}' is not set`);
              }
              io.out(formatValue(value));
            }),
        )
        .command(
          'set <key> <value>',
          'Set one value (dot notation, JSON or plain text)',
          b =>
            b
              .positional('key', { type: 'string', demandOption: true })
              .positional('value', { type: 'string', demandOption: true }),
          args =>
            run(() => {
              const value = parseValue(args.value);
              if (args.key === PORT_KEY) {
                validatePort(value);
                if (!container.settings.setProxyPort(value)) {
                  throw new CliError('✗ Failed to save configuration');
                }
              } else {
                container.appConfig.set(args.key, value);
                if (!container.appConfig.save()) {
                  throw new CliError('✗ Failed to save configuration');
                }
              }
              io.out(`✓ ${args.key} = ${JSON.stringify(value)}`);
            }),
        )
        .command(
          'import <file>',
          'Merge settings from a file',
          b =>
            b
              .positional('file', { type: 'string', demandOption: true })
              .option('format', { type: 'string', choices: FORMATS, default: 'json' as const }),
          args =>
            run(() => {
              if (!container.appConfig.importConfig(args.file, args.format)) {
                throw new CliError(`✗ Failed to import configuration from ${args.file}`);
              }
              io.out(`✓ Configuration imported from ${args.file}`);
            }),
        )
        .command(
          'export <file>',
          'Write the configuration to a file',
          b =>
            b
              .positional('file', { type: 'string', demandOption: true })
              .option('format', { type: 'string', choices: FORMATS, default: 'json' as const }),
          args =>
            run(() => {
              if (!container.appConfig.exportConfig(args.file, args.format)) {
                throw new CliError(`✗ Failed to export configuration to ${args.file}`);
              }
              io.out(`✓ Configuration exported to ${args.file}`);
            }),
        )
        .demandCommand(1, 'Specify a config command'),
    )
    .command('profile', 'Manage stored profiles', builder =>
      builder
        .command('list', 'List profiles', () => undefined, () =>
          run(() => {
            const profiles = container.profiles.loadAll();
            if (profiles.length === 0) {
              io.out('No profiles found');
              return;
            }
            const lastId = container.settings.getLastSelectedProfileId();
            for (const profile of profiles) {
              io.out(`${profile.id === lastId ? '*' : ' '} ${profile.id}  ${profile.name}`);
            }
          }),
        )
        .command(
          'add <link>',
          'Store a profile from a share link',
          b => b.positional('link', { type: 'string', demandOption: true }).option('name', { type: 'string' }),
          args =>
            run(() => {
              const server = parseShareLink(args.link);
              if (!server) {
                throw new CliError('✗ Error: Failed to parse share link');
              }
              const name = args.name ?? server.name;
              const id = container.profiles.save(name, profileConfigFromServer(server));
              if (!id) {
                throw new CliError('✗ Failed to save profile');
              }
              io.out(`✓ Profile '${name}' added (${id})`);
            }),
        )
        .command(
          'remove <id>',
          'Delete a profile',
          b => b.positional('id', { type: 'string', demandOption: true }),
          args =>
            run(() => {
              if (!container.profiles.delete(args.id)) {
                throw new CliError(`✗ Profile '${args.id}' not found`);
              }
              io.out(`✓ Profile '${args.id}' removed`);
            }),
        )
        .demandCommand(1, 'Specify a profile command'),
    )
    .command('chain', 'Manage proxy chains', builder =>
      builder
        .command('list', 'List chains', () => undefined, () =>
          run(() => {
            const chains = container.chains.loadEnriched(container.resolver);
            if (chains.length === 0) {
              io.out('No chains found');
              return;
            }
            for (const chain of chains) {
              const status = chain.valid ? 'ok' : `missing ${chain.missing_profiles.join(', ')}`;
              io.out(`${chain.id}  ${chain.name}  [${chain.items.join(' -> ')}]  ${status}`);
            }
          }),
        )
        .command(
          'add',
          'Create a chain from profile ids',
          b =>
            b
              .option('name', { type: 'string', demandOption: true })
              .option('items', { type: 'string', demandOption: true, describe: 'Comma separated profile ids' }),
          args =>
            run(() => {
              const items = args.items.split(',').map(item => item.trim()).filter(Boolean);
              const check = container.chains.validate(items, container.resolver);
              if (!check.valid) {
                throw new CliError(`✗ ${check.error || 'Invalid chain'}`);
              }
              const id = container.chains.saveValidated(args.name, items, container.resolver);
              if (!id) {
                throw new CliError('✗ Failed to save chain');
              }
              io.out(`✓ Chain '${args.name}' added (${id})`);
            }),
        )
        .command(
          'remove <id>',
          'Delete a chain',
          b => b.positional('id', { type: 'string', demandOption: true }),
          args =>
            run(() => {
              if (!container.chains.delete(args.id)) {
                throw new CliError(`✗ Chain '${args.id}' not found`);
              }
              io.out(`✓ Chain '${args.id}' removed`);
            }),
        )
        .demandCommand(1, 'Specify a chain command'),
    )
    .command('sub', 'Manage subscriptions', builder =>
      builder
        .command('list', 'List subscriptions', () => undefined, () =>
          run(() => {
            const subscriptions = container.subscriptionManager.list();
            if (subscriptions.length === 0) {
              io.out('No subscriptions found');
              return;
            }
            for (const sub of subscriptions) {
              io.out(`${sub.id}  ${sub.name}  ${sub.url}  (${sub.profiles.length} servers)`);
            }
          }),
        )
        .command(
          'add <name> <url>',
          'Add a subscription',
          b =>
            b
              .positional('name', { type: 'string', demandOption: true })
              .positional('url', { type: 'string', demandOption: true }),
          args =>
            run(() => {
              const id = container.subscriptionManager.add(args.name, args.url);
              if (!id) {
                throw new CliError(`✗ Invalid subscription URL: ${args.url}`);
              }
              io.out(`✓ Subscription '${args.name}' added (${id})`);
            }),
        )
        .command(
          'update <id>',
          'Download a subscription again',
          b => b.positional('id', { type: 'string', demandOption: true }),
          args =>
            run(async () => {
              const result = await container.subscriptionManager.update(args.id);
              if (!result.success) {
                throw new CliError(`✗ ${result.message}`);
              }
              io.out(`✓ ${result.message}`);
            }),
        )
        .command(
          'remove <id>',
          'Delete a subscription',
          b => b.positional('id', { type: 'string', demandOption: true }),
          args =>
            run(() => {
              if (!container.subscriptionManager.remove(args.id)) {
                throw new CliError(`✗ Subscription '${args.id}' not found`);
              }
              io.out(`✓ Subscription '${args.id}' removed`);
            }),
        )
        .demandCommand(1, 'Specify a subscription command'),
    )
    .command('routing', 'Manage routing rules', builder =>
      builder
        .command('list', 'Show rules, toggles and country', () => undefined, () =>
          run(() => {
            const rules = container.routing.getRules();
            for (const bucket of BUCKETS) {
              io.out(`${bucket}: ${rules[bucket].length > 0 ? rules[bucket].join(', ') : '(none)'}`);
            }
            const toggles = container.routing.getToggles();
            for (const name of TOGGLES) {
              io.out(`${name}: ${toggles[name] ? 'on' : 'off'}`);
            }
            io.out(`country: ${container.settings.getRoutingCountry()}`);
          }),
        )
        .command(
          'add <bucket> <value>',
          'Add a domain or IP rule',
          b =>
            b
              .positional('bucket', { type: 'string', choices: BUCKETS, demandOption: true })
              .positional('value', { type: 'string', demandOption: true }),
          args =>
            run(() => {
              if (!container.routing.addRule(args.bucket, args.value)) {
                throw new CliError(`✗ Rule '${args.value}' not added to ${args.bucket}`);
              }
              io.out(`✓ Added '${args.value}' to ${args.bucket}`);
            }),
        )
        .command(
          'remove <bucket> <value>',
          'Remove a rule',
          b =>
            b
              .positional('bucket', { type: 'string', choices: BUCKETS, demandOption: true })
              .positional('value', { type: 'string', demandOption: true }),
          args =>
            run(() => {
              if (!container.routing.removeRule(args.bucket, args.value)) {
                throw new CliError(`✗ Rule '${args.value}' not found in ${args.bucket}`);
              }
              io.out(`✓ Removed '${args.value}' from ${args.bucket}`);
            }),
        )
        .command(
          'toggle <name> <state>',
          'Turn a routing toggle on or off',
          b =>
            b
              .positional('name', { type: 'string', choices: TOGGLES, demandOption: true })
              .positional('state', { type: 'string', choices: ['on', 'off'] as const, demandOption: true }),
          args =>
            run(() => {
              if (!container.routing.setToggle(args.name, args.state === 'on')) {
                throw new CliError(`✗ Failed to save ${args.name}`);
              }
              io.out(`✓ ${args.name} ${args.state}`);
            }),
        )
        .command(
          'country <code>',
          'Route a country directly',
          b => b.positional('code', { type: 'string', choices: ROUTING_COUNTRIES, demandOption: true }),
          args =>
            run(() => {
              if (!container.settings.setRoutingCountry(args.code)) {
                throw new CliError('✗ Failed to save routing country');
              }
              io.out(`✓ Routing country set to ${args.code}`);
            }),
        )
        .demandCommand(1, 'Specify a routing command'),
    )
    .command('recent', 'List recently opened config files', () => undefined, () =>
      run(() => {
        const files = container.recentFiles.getAll();
        if (files.length === 0) {
          io.out('No recent files');
          return;
        }
        const last = container.recentFiles.getLastSelected();
        for (const file of files) {
          io.out(`${file === last ? '*' : ' '} ${file}`);
        }
      }),
    )
    .demandCommand(1, 'Specify a command')
    .fail((message: string | undefined, error: Error | undefined) => {
      exitCode = 1;
      io.err(message ?? error?.message ?? 'Invalid command');
    })
    .help()
    .parseAsync();

  return exitCode;
};
