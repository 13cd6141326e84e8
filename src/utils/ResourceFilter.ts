import {
  ContentItem,
  ProxmoxNode,
  RawNode,
  RawStorage,
  RawVirtualMachine,
  Storage,
  VirtualMachine,
  VmFilter
} from '../types';

/**
 * Client-side projection and matching of API listings
 */
export class ResourceFilter {
  /**
   * Return the first item whose key equals the filter exactly (case-sensitive)
   */
  static findFirst<T>(items: T[], key: (item: T) => string | number, value: string | number): T | undefined {
    return items.find(item => key(item) === value);
  }

  static toNode(raw: RawNode): ProxmoxNode {
    return {
      id: raw.id,
      status: raw.status,
      name: raw.node
    };
  }

  /**
   * Project a storage record; `content` arrives as a comma-separated list
   */
  static toStorage(raw: RawStorage): Storage {
    return {
      name: raw.storage,
      contentTypes: raw.content
        ? raw.content.split(',').map(type => type.trim()).filter(type => type.length > 0)
        : [],
      usedFraction: raw.used_fraction ?? 0,
      available: raw.avail ?? 0
    };
  }

  /**
   * Keep every server field and add numeric `id`, `name` and `status`
   */
  static toVirtualMachine(raw: RawVirtualMachine): VirtualMachine {
    return {
      ...raw,
      id: Number(raw.vmid),
      name: raw.name ?? '',
      status: raw.status ?? 'unknown'
    };
  }

  static vmKey(filter: VmFilter): (vm: VirtualMachine) => string | number {
    return typeof filter === 'number' ? vm => vm.id : vm => vm.name;
  }

  static contentKey(item: ContentItem): string {
    return item.volid;
  }

  /**
   * Highest VM id in a listing, or undefined for an empty one
   */
  static maxVmId(vms: VirtualMachine[]): number | undefined {
    const ids = vms.map(vm => vm.id).filter(id => Number.isFinite(id));
    return ids.length > 0 ? Math.max(...ids) : undefined;
  }
}
