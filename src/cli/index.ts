#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { ProxmoxClient } from '../clients/ProxmoxClient';
import { DEFAULT_TRANSPORT_OPTIONS } from '../clients/ProxmoxConnector';
import { ClientConfig, ContentItem, CreateVmParams, ProxmoxNode, Storage, VirtualMachine, VmActionResult } from '../types';
import { logger, setLogLevel } from '../utils/logger';
import * as fs from 'fs';

export interface ConnectionOptions {
  config?: string;
  verbose?: boolean;
  host?: string;
  tokenId?: string;
  secret?: string;
  timeout?: number;
  verifyTls?: boolean;
}

export interface CreateVmOptions extends ConnectionOptions {
  memory: number;
  cpu: string;
  sockets: number;
  cores: number;
  osType: string;
  storage: string;
  disk: number;
  iso: string;
}

type VmAction = 'delete' | 'start' | 'stop';

/**
 * CLI interface for the Proxmox VE client
 */
class ProxmoxVmCLI {
  private program: Command;

  constructor() {
    this.program = new Command();
    this.setupCommands();
  }

  /**
   * Setup CLI commands and options
   */
  private setupCommands(): void {
    this.program
      .name('pve-vm')
      .description('Inspect nodes and storage and manage QEMU virtual machines through the Proxmox VE API')
      .version('1.0.0');

    this.withConnectionOptions(
      this.program
        .command('nodes [name]')
        .description('List cluster nodes, or show one node by name')
    ).action(async (name: string | undefined, options: ConnectionOptions) => {
      await this.runSafely('List nodes', () => this.listNodes(name, options));
    });

    this.withConnectionOptions(
      this.program
        .command('storage <node> [name]')
        .description('List storage pools on a node, or show one pool by name')
    ).action(async (node: string, name: string | undefined, options: ConnectionOptions) => {
      await this.runSafely('List storage', () => this.listStorage(node, name, options));
    });

    this.withConnectionOptions(
      this.program
        .command('content <node> <storage> [volid]')
        .description('List content in a storage pool, or show one item by volume id')
    ).action(async (node: string, storage: string, volid: string | undefined, options: ConnectionOptions) => {
      await this.runSafely('List content', () => this.listContent(node, storage, volid, options));
    });

    this.withConnectionOptions(
      this.program
        .command('vms <node> [name]')
        .description('List QEMU virtual machines on a node, or show one VM by name')
    ).action(async (node: string, name: string | undefined, options: ConnectionOptions) => {
      await this.runSafely('List VMs', () => this.listVms(node, name, options));
    });

    this.withConnectionOptions(
      this.program
        .command('add-content <node> <storage> <kind> <file> <url>')
        .description('Download a file into a storage pool (kind: iso, vztmpl, import)')
    ).action(async (node: string, storage: string, kind: string, file: string, url: string, options: ConnectionOptions) => {
      await this.runSafely('Add content', () => this.addContent(node, storage, kind, file, url, options));
    });

    this.withConnectionOptions(
      this.program
        .command('create-vm <node> <name>')
        .description('Create a QEMU virtual machine')
        .requiredOption('--storage <storage>', 'Storage pool for the primary disk')
        .requiredOption('--disk <gb>', 'Primary disk size in GB', parseInteger)
        .requiredOption('--iso <ref>', 'ISO volume to mount as CD-ROM (e.g. local:iso/ubuntu.iso)')
        .option('--memory <gb>', 'Memory in GB', parseInteger, 2)
        .option('--cpu <type>', 'CPU type', 'x86-64-v2-AES')
        .option('--sockets <count>', 'CPU sockets', parseInteger, 1)
        .option('--cores <count>', 'Cores per socket', parseInteger, 1)
        .option('--os-type <type>', 'Guest OS type', 'l26')
    ).action(async (node: string, name: string, options: CreateVmOptions) => {
      await this.runSafely('Create VM', () => this.createVm(node, name, options));
    });

    const actions: Array<[string, VmAction, string]> = [
      ['delete-vm', 'delete', 'Delete a virtual machine by name'],
      ['start-vm', 'start', 'Start a virtual machine by name'],
      ['stop-vm', 'stop', 'Gracefully shut down a virtual machine by name']
    ];
    for (const [command, action, description] of actions) {
      this.withConnectionOptions(
        this.program
          .command(`${command} <node> <name>`)
          .description(description)
      ).action(async (node: string, name: string, options: ConnectionOptions) => {
        await this.runSafely(`VM ${action}`, () => this.vmAction(action, node, name, options));
      });
    }

    this.withConnectionOptions(
      this.program
        .command('validate-config')
        .description('Validate configuration and test the Proxmox connection')
    ).action(async (options: ConnectionOptions) => {
      await this.runSafely('Config validation', () => this.validateConfig(options));
    });
  }

  private withConnectionOptions(command: Command): Command {
    return command
      .option('-c, --config <path>', 'Path to configuration file')
      .option('-v, --verbose', 'Enable verbose logging')
      .option('--host <host>', 'Proxmox host address')
      .option('--token-id <id>', 'API token id (format: user@realm!tokenname)')
      .option('--secret <secret>', 'API token secret')
      .option('--timeout <ms>', 'Request timeout in milliseconds', parseInteger)
      .option('--verify-tls', 'Validate the server certificate');
  }

  private async runSafely(label: string, task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error) {
      console.error(`❌ ${label} failed:`, error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  }

  private async listNodes(name: string | undefined, options: ConnectionOptions): Promise<void> {
    const client = await this.connect(options);
    const nodes = name === undefined ? await client.listNodes() : [await client.listNodes(name)];
    this.displayNodes(nodes);
  }

  private async listStorage(node: string, name: string | undefined, options: ConnectionOptions): Promise<void> {
    const client = await this.connect(options);
    const pools = name === undefined ? await client.listStorage(node) : [await client.listStorage(node, name)];
    this.displayStorage(pools);
  }

  private async listContent(node: string, storage: string, volid: string | undefined, options: ConnectionOptions): Promise<void> {
    const client = await this.connect(options);
    const items = volid === undefined ? await client.listContent(node, storage) : [await client.listContent(node, storage, volid)];
    this.displayContent(items);
  }

  private async listVms(node: string, name: string | undefined, options: ConnectionOptions): Promise<void> {
    const client = await this.connect(options);
    const vms = name === undefined ? await client.listVms(node) : [await client.listVms(node, name)];
    this.displayVms(vms);
  }

  private async addContent(
    node: string,
    storage: string,
    kind: string,
    file: string,
    url: string,
    options: ConnectionOptions
  ): Promise<void> {
    const client = await this.connect(options);
    const task = await client.addContent(node, storage, kind, file, url);
    console.log(`📥 Download of ${file} into ${storage} started (task ${task})`);
  }

  private async createVm(node: string, name: string, options: CreateVmOptions): Promise<void> {
    const client = await this.connect(options);
    const params: CreateVmParams = {
      node,
      name,
      memoryGB: options.memory,
      cpuType: options.cpu,
      sockets: options.sockets,
      cores: options.cores,
      osType: options.osType,
      storage: options.storage,
      diskGB: options.disk,
      isoRef: options.iso
    };
    const result = await client.createVm(params);
    console.log(`🆕 VM ${result.name} (${result.id}) creation started on ${result.node} (task ${result.task})`);
  }

  private async vmAction(action: VmAction, node: string, name: string, options: ConnectionOptions): Promise<void> {
    const client = await this.connect(options);
    const result = await this.dispatchVmAction(client, action, node, name);
    console.log(`✅ VM ${result.name} (${result.id}) ${action} requested on ${result.node} (task ${result.task})`);
  }

  private dispatchVmAction(client: ProxmoxClient, action: VmAction, node: string, name: string): Promise<VmActionResult> {
    switch (action) {
    case 'delete':
      return client.deleteVm(node, name);
    case 'start':
      return client.startVm(node, name);
    case 'stop':
      return client.stopVm(node, name);
    }
  }

  /**
   * Validate configuration file
   */
  private async validateConfig(options: ConnectionOptions): Promise<void> {
    console.log('✅ Validating configuration...\n');

    const config = this.loadConfig(options);
    this.validateConfigStructure(config);

    console.log('🔗 Testing Proxmox connection...');
    await ProxmoxClient.connect(config.proxmox, config.transport);
    console.log('✅ Proxmox connection successful');

    console.log('\n🎉 Configuration is valid!');
  }

  private async connect(options: ConnectionOptions): Promise<ProxmoxClient> {
    const config = this.loadConfig(options);
    this.validateConfigStructure(config);
    return ProxmoxClient.connect(config.proxmox, config.transport);
  }

  /**
   * Load configuration: defaults, then config file, then environment, then CLI options
   */
  loadConfig(options: ConnectionOptions): ClientConfig {
    const config = this.createDefaultConfig();

    if (options.config && fs.existsSync(options.config)) {
      const fileConfig: Partial<ClientConfig> = JSON.parse(fs.readFileSync(options.config, 'utf8'));
      config.proxmox = { ...config.proxmox, ...fileConfig.proxmox };
      config.transport = { ...config.transport, ...fileConfig.transport };
      config.reporting = { ...config.reporting, ...fileConfig.reporting };
    }

    this.applyEnvironment(config);
    this.applyCliOptions(config, options);

    if (config.reporting.verbose) {
      setLogLevel('debug');
    }

    return config;
  }

  /**
   * Create default configuration
   */
  private createDefaultConfig(): ClientConfig {
    return {
      proxmox: {
        host: '',
        tokenId: '',
        secret: ''
      },
      transport: { ...DEFAULT_TRANSPORT_OPTIONS },
      reporting: {
        verbose: false
      }
    };
  }

  private applyEnvironment(config: ClientConfig): void {
    if (process.env.PVE_HOST) {
      config.proxmox.host = process.env.PVE_HOST;
    }
    if (process.env.PVE_TOKEN_ID) {
      config.proxmox.tokenId = process.env.PVE_TOKEN_ID;
    }
    if (process.env.PVE_TOKEN_SECRET) {
      config.proxmox.secret = process.env.PVE_TOKEN_SECRET;
    }
  }

  /**
   * Apply CLI options to configuration
   */
  private applyCliOptions(config: ClientConfig, options: ConnectionOptions): void {
    if (options.host) {
      config.proxmox.host = options.host;
    }
    if (options.tokenId) {
      config.proxmox.tokenId = options.tokenId;
    }
    if (options.secret) {
      config.proxmox.secret = options.secret;
    }
    if (options.timeout !== undefined) {
      config.transport.timeout = options.timeout;
    }
    if (options.verifyTls) {
      config.transport.rejectUnauthorized = true;
    }
    if (options.verbose) {
      config.reporting.verbose = true;
    }
  }

  /**
   * Validate configuration structure
   */
  validateConfigStructure(config: ClientConfig): void {
    const missing = (['host', 'tokenId', 'secret'] as const).filter(key => !config.proxmox[key]);
    if (missing.length > 0) {
      throw new Error(`Missing Proxmox settings: ${missing.join(', ')}`);
    }
    if (!Number.isInteger(config.transport.timeout) || config.transport.timeout <= 0) {
      throw new Error(`Invalid timeout: ${config.transport.timeout}`);
    }
  }

  private displayNodes(nodes: ProxmoxNode[]): void {
    console.log(`🖥️ ${nodes.length} node(s):`);
    nodes.forEach(node => {
      console.log(`   • ${node.name} [${node.status}] (${node.id})`);
    });
  }

  private displayStorage(pools: Storage[]): void {
    console.log(`💾 ${pools.length} storage pool(s):`);
    pools.forEach(pool => {
      const used = (pool.usedFraction * 100).toFixed(1);
      console.log(`   • ${pool.name} - ${used}% used, ${formatBytes(pool.available)} free [${pool.contentTypes.join(', ')}]`);
    });
  }

  private displayContent(items: ContentItem[]): void {
    console.log(`📦 ${items.length} content item(s):`);
    items.forEach(item => {
      const size = typeof item.size === 'number' ? ` - ${formatBytes(item.size)}` : '';
      console.log(`   • ${item.volid}${size}`);
    });
  }

  private displayVms(vms: VirtualMachine[]): void {
    console.log(`🧩 ${vms.length} virtual machine(s):`);
    vms.forEach(vm => {
      console.log(`   • ${vm.id} ${vm.name} [${vm.status}]`);
    });
  }

  /**
   * Run the CLI. `--verbose` only raises the log level for this run
   */
  public async run(argv: string[] = process.argv): Promise<void> {
    const level = logger.level;
    try {
      await this.program.parseAsync(argv);
    } finally {
      setLogLevel(level);
    }
  }
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Format bytes to human readable format
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B';

  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

// Run CLI if this file is executed directly
if (require.main === module) {
  const cli = new ProxmoxVmCLI();
  cli.run().catch(error => {
    console.error('❌ CLI Error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}

export { ProxmoxVmCLI };
