import {
  ContentItem,
  ProxmoxNode,
  RawNode,
  RawStorage,
  RawVirtualMachine,
  Session,
  Storage,
  VirtualMachine,
  VmFilter
} from '../types';
import { IResourceAccessor } from '../interfaces';
import { ApiTransport, apiPath } from '../clients/ApiTransport';
import { NotFoundError } from '../errors';
import { ResourceFilter } from '../utils/ResourceFilter';

/**
 * Read-only listings of nodes, storage, content and VMs.
 *
 * Every call issues exactly one GET and filters the result in memory.
 * Nothing is cached, so a name looked up here can be stale by the time
 * the caller acts on it.
 */
export class ResourceAccessor implements IResourceAccessor {
  private readonly transport: ApiTransport;

  constructor(session: Session, transport: ApiTransport = new ApiTransport(session)) {
    this.transport = transport;
  }

  listNodes(): Promise<ProxmoxNode[]>;
  listNodes(name: string): Promise<ProxmoxNode>;
  async listNodes(name?: string): Promise<ProxmoxNode[] | ProxmoxNode> {
    const raw = await this.transport.getList<RawNode>(apiPath('nodes'));
    const nodes = raw.map(ResourceFilter.toNode);

    if (name === undefined) {
      return nodes;
    }
    return this.requireMatch(nodes, node => node.name, name, 'node');
  }

  listStorage(node: string): Promise<Storage[]>;
  listStorage(node: string, name: string): Promise<Storage>;
  async listStorage(node: string, name?: string): Promise<Storage[] | Storage> {
    const raw = await this.transport.getList<RawStorage>(apiPath('nodes', node, 'storage'));
    const pools = raw.map(ResourceFilter.toStorage);

    if (name === undefined) {
      return pools;
    }
    return this.requireMatch(pools, pool => pool.name, name, 'storage', `node ${node}`);
  }

  listContent(node: string, storage: string): Promise<ContentItem[]>;
  listContent(node: string, storage: string, volid: string): Promise<ContentItem>;
  async listContent(node: string, storage: string, volid?: string): Promise<ContentItem[] | ContentItem> {
    const items = await this.transport.getList<ContentItem>(apiPath('nodes', node, 'storage', storage, 'content'));

    if (volid === undefined) {
      return items;
    }
    return this.requireMatch(items, ResourceFilter.contentKey, volid, 'content', `${node}/${storage}`);
  }

  listVms(node: string): Promise<VirtualMachine[]>;
  listVms(node: string, filter: VmFilter): Promise<VirtualMachine>;
  async listVms(node: string, filter?: VmFilter): Promise<VirtualMachine[] | VirtualMachine> {
    const raw = await this.transport.getList<RawVirtualMachine>(apiPath('nodes', node, 'qemu'));
    const vms = raw.map(ResourceFilter.toVirtualMachine);

    if (filter === undefined) {
      return vms;
    }
    return this.requireMatch(vms, ResourceFilter.vmKey(filter), filter, 'vm', `node ${node}`);
  }

  private requireMatch<T>(
    items: T[],
    key: (item: T) => string | number,
    value: string | number,
    kind: NotFoundError['kind'],
    scope?: string
  ): T {
    const match = ResourceFilter.findFirst(items, key, value);
    if (match === undefined) {
      throw new NotFoundError(kind, value, this.transport.host, scope);
    }
    return match;
  }
}
