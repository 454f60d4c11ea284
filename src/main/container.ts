import path from 'path';
import { AppConfig } from '../db/appConfig.js';
import { ChainRepository } from '../db/chainRepository.js';
import { ConfigFileLoader } from '../db/configFileLoader.js';
import { DnsRepository } from '../db/dnsRepository.js';
import { ProfileRepository } from '../db/profileRepository.js';
import { RecentFilesRepository } from '../db/recentFilesRepository.js';
import { RoutingRepository } from '../db/routingRepository.js';
import { RuntimeStateRepository } from '../db/runtimeStateRepository.js';
import { SettingsRepository } from '../db/settingsRepository.js';
import { SubscriptionRepository } from '../db/subscriptionRepository.js';
import { ConnectionManager } from '../services/connectionManager.js';
import { XrayConnectionTester } from '../services/connectionTester.js';
import type { ConnectionTester } from '../services/connectionTester.js';
import { TcpNetworkValidator } from '../services/networkValidator.js';
import type { NetworkValidator } from '../services/networkValidator.js';
import { RepositoryProfileResolver } from '../services/profileResolver.js';
import { RoutingManager } from '../services/routing/RoutingManager.js';
import { ServerManager } from '../services/serverManager.js';
import { SubscriptionManager } from '../services/subscriptionManager.js';
import type { Fetcher } from '../services/subscriptionManager.js';
import { XrayManager } from '../services/xrayManager.js';
import type { XrayManagerOptions } from '../services/xrayManager.js';
import type { InboundSettings } from '../types/models.js';
import { getConfigDir, getRuntimeStatePath, getTempDir } from '../utils/paths.js';

export interface ContainerOptions {
  configDir?: string;
  tempDir?: string;
  xray?: Omit<XrayManagerOptions, 'configOptions' | 'tempDir'>;
  networkValidator?: NetworkValidator;
  connectionTester?: ConnectionTester;
  fetcher?: Fetcher;
}

export interface AppContainer {
  configDir: string;
  tempDir: string;
  appConfig: AppConfig;
  settings: SettingsRepository;
  /** The listener from `config.json` on the port from the settings store. */
  getInbound: () => InboundSettings;
  profiles: ProfileRepository;
  chains: ChainRepository;
  subscriptions: SubscriptionRepository;
  dns: DnsRepository;
  recentFiles: RecentFilesRepository;
  runtimeState: RuntimeStateRepository;
  resolver: RepositoryProfileResolver;
  routing: RoutingManager;
  xray: XrayManager;
  servers: ServerManager;
  subscriptionManager: SubscriptionManager;
  connection: ConnectionManager;
}

/** Builds every store and service against one config directory. */
export const createContainer = (options: ContainerOptions = {}): AppContainer => {
  const configDir = options.configDir ?? getConfigDir();
  const tempDir = options.tempDir ?? getTempDir();

  const appConfig = new AppConfig(path.join(configDir, 'config.json'));
  const settings = new SettingsRepository(configDir);
  const profiles = new ProfileRepository(configDir);
  const chains = new ChainRepository(configDir);
  const subscriptions = new SubscriptionRepository(configDir);
  const dns = new DnsRepository(configDir);
  const routing = new RoutingManager(new RoutingRepository(configDir), settings);
  const resolver = new RepositoryProfileResolver(profiles, subscriptions, chains);
  const getInbound = (): InboundSettings => ({ ...appConfig.getInboundListener(), port: settings.getProxyPort() });

  const xray = new XrayManager(appConfig, {
    ...options.xray,
    tempDir,
    configOptions: () => ({
      inbound: getInbound(),
      routingRules: routing.getXrayRoutingRules(),
      dns: dns.load(),
      directPrivateIps: routing.getToggles().direct_private_ips,
    }),
  });

  const connectionTester =
    options.connectionTester ??
    new XrayConnectionTester({ findBinary: () => xray.findXrayBinary(), spawnFn: options.xray?.spawnFn, tempDir });

  const connection = new ConnectionManager({
    xray,
    configLoader: new ConfigFileLoader(),
    networkValidator: options.networkValidator ?? new TcpNetworkValidator(),
    connectionTester,
    isAutoReconnectEnabled: () => appConfig.getAutoReconnect() && settings.getAutoReconnectEnabled(),
    tempDir,
  });

  return {
    configDir,
    tempDir,
    appConfig,
    settings,
    getInbound,
    profiles,
    chains,
    subscriptions,
    dns,
    recentFiles: new RecentFilesRepository(configDir),
    runtimeState: new RuntimeStateRepository(getRuntimeStatePath(configDir)),
    resolver,
    routing,
    xray,
    servers: new ServerManager(appConfig),
    subscriptionManager: new SubscriptionManager(subscriptions, options.fetcher),
    connection,
  };
};
