import {
  ContentItem,
  CreateVmParams,
  ProxmoxConfig,
  ProxmoxNode,
  Session,
  Storage,
  TransportOptions,
  VirtualMachine,
  VmActionResult,
  VmCreationResult,
  VmFilter
} from '../types';
import { ApiTransport } from './ApiTransport';
import { ProxmoxConnector } from './ProxmoxConnector';
import { ResourceAccessor } from '../accessors/ResourceAccessor';
import { ContentUploader } from '../managers/ContentUploader';
import { VmLifecycleManager } from '../managers/VmLifecycleManager';

/**
 * Proxmox API client: one connected session with every operation bound to it
 */
export class ProxmoxClient {
  readonly session: Session;
  readonly resources: ResourceAccessor;
  readonly content: ContentUploader;
  readonly vms: VmLifecycleManager;

  constructor(session: Session) {
    const transport = new ApiTransport(session);
    this.session = session;
    this.resources = new ResourceAccessor(session, transport);
    this.content = new ContentUploader(session, transport);
    this.vms = new VmLifecycleManager(session, transport, this.resources);
  }

  /**
   * Probe the host with the configured token and return a bound client
   */
  static async connect(config: ProxmoxConfig, transport: Partial<TransportOptions> = {}): Promise<ProxmoxClient> {
    const connector = new ProxmoxConnector(transport);
    const session = await connector.connect(config.host, config.tokenId, config.secret);
    return new ProxmoxClient(session);
  }

  listNodes(): Promise<ProxmoxNode[]>;
  listNodes(name: string): Promise<ProxmoxNode>;
  listNodes(name?: string): Promise<ProxmoxNode[] | ProxmoxNode> {
    return name === undefined ? this.resources.listNodes() : this.resources.listNodes(name);
  }

  listStorage(node: string): Promise<Storage[]>;
  listStorage(node: string, name: string): Promise<Storage>;
  listStorage(node: string, name?: string): Promise<Storage[] | Storage> {
    return name === undefined ? this.resources.listStorage(node) : this.resources.listStorage(node, name);
  }

  listContent(node: string, storage: string): Promise<ContentItem[]>;
  listContent(node: string, storage: string, volid: string): Promise<ContentItem>;
  listContent(node: string, storage: string, volid?: string): Promise<ContentItem[] | ContentItem> {
    return volid === undefined
      ? this.resources.listContent(node, storage)
      : this.resources.listContent(node, storage, volid);
  }

  listVms(node: string): Promise<VirtualMachine[]>;
  listVms(node: string, filter: VmFilter): Promise<VirtualMachine>;
  listVms(node: string, filter?: VmFilter): Promise<VirtualMachine[] | VirtualMachine> {
    return filter === undefined ? this.resources.listVms(node) : this.resources.listVms(node, filter);
  }

  addContent(node: string, storage: string, contentKind: string, fileName: string, sourceUrl: string): Promise<string> {
    return this.content.addContent(node, storage, contentKind, fileName, sourceUrl);
  }

  createVm(params: CreateVmParams): Promise<VmCreationResult> {
    return this.vms.createVm(params);
  }

  deleteVm(node: string, name: string): Promise<VmActionResult> {
    return this.vms.deleteVm(node, name);
  }

  startVm(node: string, name: string): Promise<VmActionResult> {
    return this.vms.startVm(node, name);
  }

  stopVm(node: string, name: string): Promise<VmActionResult> {
    return this.vms.stopVm(node, name);
  }
}
