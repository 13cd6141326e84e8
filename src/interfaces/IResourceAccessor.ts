import { ContentItem, ProxmoxNode, Storage, VirtualMachine, VmFilter } from '../types';

/**
 * Interface for read-only listing of cluster resources
 */
export interface IResourceAccessor {
  /**
   * List nodes, or return the node with the given name
   */
  listNodes(): Promise<ProxmoxNode[]>;
  listNodes(name: string): Promise<ProxmoxNode>;

  /**
   * List storage pools on a node, or return the pool with the given name
   */
  listStorage(node: string): Promise<Storage[]>;
  listStorage(node: string, name: string): Promise<Storage>;

  /**
   * List stored content, or return the item with the given volume id
   */
  listContent(node: string, storage: string): Promise<ContentItem[]>;
  listContent(node: string, storage: string, volid: string): Promise<ContentItem>;

  /**
   * List QEMU VMs on a node, or return the VM with the given name or id
   */
  listVms(node: string): Promise<VirtualMachine[]>;
  listVms(node: string, filter: VmFilter): Promise<VirtualMachine>;
}
