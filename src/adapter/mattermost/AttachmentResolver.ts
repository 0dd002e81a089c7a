import type { Logger } from '../../infra/logger/logger.js';
import { errorMessage } from '../../core/errors.js';
import { msgTypeForMime, type Attachment } from '../../core/model/Message.js';
import type { MattermostApi } from './MattermostApi.js';

/**
 * Looks up the files on an inbound post with the relay credential. A file
 * whose info cannot be read is logged and skipped; the post still goes out.
 */
export class AttachmentResolver {
  constructor(
    private readonly api: MattermostApi,
    private readonly credential: string,
    private readonly logger: Logger,
  ) {}

  async resolve(fileIds: readonly string[]): Promise<Attachment[]> {
    const attachments: Attachment[] = [];
    for (const fileId of fileIds) {
      try {
        const info = await this.api.getFileInfo(this.credential, fileId);
        const mimetype = info.mimeType || 'application/octet-stream';
        attachments.push({
          fileId: info.id,
          msgtype: msgTypeForMime(mimetype),
          body: info.name,
          info: { mimetype, size: info.size },
        });
      } catch (err) {
        this.logger.error('attachments', `Failed to get file info for ${fileId}: ${errorMessage(err)}`);
      }
    }
    return attachments;
  }
}
