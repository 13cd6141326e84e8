import { CONTENT_KINDS, ContentKind, DownloadUrlRequest, Session } from '../types';
import { IContentUploader } from '../interfaces';
import { ApiTransport, apiPath } from '../clients/ApiTransport';
import { assertOneOf } from '../utils/validation';
import { logger } from '../utils/logger';

/** Older name for container templates, still accepted from callers */
const CONTENT_KIND_ALIASES = new Map<string, ContentKind>([
  ['template', 'vztmpl']
]);

/**
 * Fetches ISOs, container templates and disk imports into a storage pool by URL
 */
export class ContentUploader implements IContentUploader {
  private readonly transport: ApiTransport;

  constructor(session: Session, transport: ApiTransport = new ApiTransport(session)) {
    this.transport = transport;
  }

  /**
   * Start a server-side download. Resolves with the task id as soon as the
   * node accepts the request; completion is not tracked.
   */
  async addContent(
    node: string,
    storage: string,
    contentKind: string,
    fileName: string,
    sourceUrl: string
  ): Promise<string> {
    const content = assertOneOf(
      'contentKind',
      CONTENT_KIND_ALIASES.get(contentKind) ?? contentKind,
      CONTENT_KINDS
    );

    const body: DownloadUrlRequest = {
      content,
      filename: fileName,
      node,
      storage,
      url: sourceUrl
    };

    logger.info('Requesting content download', { host: this.transport.host, node, storage, content, fileName });
    return this.transport.post<string>(apiPath('nodes', node, 'storage', storage, 'download-url'), body);
  }
}
