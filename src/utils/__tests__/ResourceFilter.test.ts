import * as fc from 'fast-check';
import { ResourceFilter } from '../ResourceFilter';

describe('ResourceFilter Property Tests', () => {
  it('should split storage content lists without empty entries', async () => {
    await fc.assert(
      fc.property(
        fc.array(fc.constantFrom('iso', 'vztmpl', 'images', 'rootdir', 'backup', 'snippets', 'import'), { maxLength: 7 }),
        (types) => {
          const storage = ResourceFilter.toStorage({ storage: 'local', content: types.join(',') });

          expect(storage.contentTypes).toEqual(types);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('should compute the maximum VM id of any non-empty listing', async () => {
    await fc.assert(
      fc.property(
        fc.array(fc.integer({ min: 100, max: 999999 }), { minLength: 1, maxLength: 30 }),
        (ids) => {
          const vms = ids.map(vmid => ResourceFilter.toVirtualMachine({ vmid }));

          expect(ResourceFilter.maxVmId(vms)).toBe(Math.max(...ids));
        }
      ),
      { numRuns: 100 }
    );
  });
});

describe('ResourceFilter', () => {
  it('should default missing storage figures to zero', () => {
    expect(ResourceFilter.toStorage({ storage: 'nfs' })).toEqual({
      name: 'nfs',
      contentTypes: [],
      usedFraction: 0,
      available: 0
    });
  });

  it('should return undefined as the maximum of an empty listing', () => {
    expect(ResourceFilter.maxVmId([])).toBeUndefined();
  });

  it('should ignore non-numeric vmids when computing the maximum', () => {
    const vms = [{ vmid: 'abc' }, { vmid: 120 }].map(ResourceFilter.toVirtualMachine);

    expect(ResourceFilter.maxVmId(vms)).toBe(120);
  });

  it('should fill in name and status for VMs without them', () => {
    expect(ResourceFilter.toVirtualMachine({ vmid: 130 })).toEqual({
      vmid: 130,
      id: 130,
      name: '',
      status: 'unknown'
    });
  });

  it('should match VM filters by id for numbers and by name for strings', () => {
    const vms = [
      ResourceFilter.toVirtualMachine({ vmid: 200, name: '300' }),
      ResourceFilter.toVirtualMachine({ vmid: 300, name: 'app' })
    ];

    expect(ResourceFilter.findFirst(vms, ResourceFilter.vmKey(300), 300)?.name).toBe('app');
    expect(ResourceFilter.findFirst(vms, ResourceFilter.vmKey('300'), '300')?.id).toBe(200);
  });
});
