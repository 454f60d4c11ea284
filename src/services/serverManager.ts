import type { AppConfig } from '../db/appConfig.js';
import { isProtocol } from '../types/models.js';
import type { ServerDefinition } from '../types/models.js';
import { ValidationError } from '../utils/validators.js';
import debugLogger from './debugLogger.js';
import { parseShareLink, toShareLink } from './shareLinks.js';

const validateServer = (server: ServerDefinition): void => {
  if (!server.id.trim()) {
    throw new ValidationError('Server id is required');
  }
  if (!server.name.trim()) {
    throw new ValidationError('Server name is required');
  }
  if (!isProtocol(server.protocol)) {
    throw new ValidationError(`Unsupported protocol: ${server.protocol}`);
  }
  if (!server.address.trim()) {
    throw new ValidationError('Server address is required');
  }
  if (!Number.isInteger(server.port) || server.port < 1 || server.port > 65535) {
    throw new ValidationError(`Invalid server port: ${server.port}`);
  }
};

/** The flat server list of the command-line config document. */
export class ServerManager {
  constructor(private config: AppConfig) {}

  listServers(): ServerDefinition[] {
    return this.config.getServers();
  }

  getServer(id: string): ServerDefinition | null {
    return this.listServers().find(s => s.id === id) ?? null;
  }

  /** Throws ValidationError for malformed entries and duplicate ids. */
  addServer(server: ServerDefinition): boolean {
    validateServer(server);
    if (this.getServer(server.id)) {
      throw new ValidationError(`Server '${server.id}' already exists`);
    }
    debugLogger.info('ServerManager', 'Adding server', { id: server.id, name: server.name, protocol: server.protocol });
    return this.config.addServer(server);
  }

  removeServer(id: string): boolean {
    const removed = this.config.removeServer(id);
    if (removed) {
      debugLogger.info('ServerManager', `Server removed: ${id}`);
    }
    return removed;
  }

  setActiveServer(id: string): boolean {
    if (!this.getServer(id)) {
      return false;
    }
    return this.config.setActiveServer(id);
  }

  getActiveServer(): ServerDefinition | null {
    return this.config.getActiveServer();
  }

  /** Adds a server from a share link. `id` overrides the generated id. */
  importFromLink(link: string, id?: string): ServerDefinition {
    const server = parseShareLink(link, id);
    if (!server) {
      throw new ValidationError('Unrecognized or malformed share link');
    }
    if (!this.addServer(server)) {
      throw new ValidationError('Failed to save server');
    }
    return server;
  }

  exportLink(id: string): string | null {
    const server = this.getServer(id);
    return server ? toShareLink(server) : null;
  }
}
