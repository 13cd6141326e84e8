import * as fc from 'fast-check';
import { ResourceAccessor } from '../ResourceAccessor';
import { NotFoundError } from '../../errors';
import { MockApi, envelope, mockApi, testSession } from '../../__tests__/helpers/mockApi';

describe('ResourceAccessor Property Tests', () => {
  let api: MockApi;

  beforeEach(() => {
    api = mockApi();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const rawNodeArb = fc.record({
    node: fc.string({ minLength: 1, maxLength: 12 }),
    status: fc.constantFrom('online', 'offline', 'unknown'),
    cpu: fc.double({ min: 0, max: 1, noNaN: true }),
    maxmem: fc.nat()
  }).map(raw => ({ ...raw, id: `node/${raw.node}` }));

  it('should return exactly the projected fields of the first node with a matching name', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(rawNodeArb, { minLength: 1, maxLength: 10 }),
        fc.nat(),
        async (rawNodes, pick) => {
          api.request.mockReset();
          api.request.mockResolvedValueOnce(envelope(rawNodes));
          const target = rawNodes[pick % rawNodes.length];
          const expected = rawNodes.find(raw => raw.node === target.node);

          const node = await new ResourceAccessor(testSession()).listNodes(target.node);

          expect(node).toStrictEqual({ id: expected?.id, status: expected?.status, name: target.node });
          expect(api.request).toHaveBeenCalledTimes(1);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('should never return an empty success for a name that is not listed', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(rawNodeArb, { maxLength: 10 }),
        fc.string({ minLength: 1, maxLength: 12 }),
        async (rawNodes, name) => {
          fc.pre(!rawNodes.some(raw => raw.node === name));
          api.request.mockReset();
          api.request.mockResolvedValueOnce(envelope(rawNodes));

          await expect(new ResourceAccessor(testSession()).listNodes(name)).rejects.toBeInstanceOf(NotFoundError);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('should never resolve a VM id that is not listed', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.uniqueArray(fc.integer({ min: 100, max: 999999 }), { maxLength: 10 }),
        fc.integer({ min: 100, max: 999999 }),
        async (ids, missing) => {
          fc.pre(!ids.includes(missing));
          api.request.mockReset();
          api.request.mockResolvedValueOnce(envelope(ids.map(vmid => ({ vmid, name: `vm-${vmid}`, status: 'stopped' }))));

          await expect(new ResourceAccessor(testSession()).listVms('pve01', missing)).rejects.toBeInstanceOf(NotFoundError);
        }
      ),
      { numRuns: 100 }
    );
  });
});
