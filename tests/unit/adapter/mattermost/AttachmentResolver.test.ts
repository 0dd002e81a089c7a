import { describe, it, expect, vi } from 'vitest';
import { AttachmentResolver } from '../../../../src/adapter/mattermost/AttachmentResolver.js';
import type { FileInfo, MattermostApi } from '../../../../src/adapter/mattermost/MattermostApi.js';
import { ApiError } from '../../../../src/core/errors.js';
import { msgTypeForMime } from '../../../../src/core/model/Message.js';
import { createRecordingLogger } from '../../../helpers.js';

const FILES: Record<string, FileInfo> = {
  'file-img': { id: 'file-img', name: 'cat.png', mimeType: 'image/png', size: 512 },
  'file-doc': { id: 'file-doc', name: 'notes', mimeType: '', size: 10 },
};

function apiWith(getFileInfo: MattermostApi['getFileInfo']): MattermostApi {
  const unused = async (): Promise<never> => {
    throw new Error('not used here');
  };
  return {
    getMe: unused,
    createPost: unused,
    patchPost: unused,
    deletePost: unused,
    uploadFile: unused,
    getFileInfo,
    saveReaction: unused,
    deleteReaction: unused,
    publishTyping: unused,
    viewChannel: unused,
  };
}

describe('msgTypeForMime', () => {
  it('picks the Matrix media type from the MIME prefix', () => {
    expect(msgTypeForMime('image/gif')).toBe('m.image');
    expect(msgTypeForMime('video/mp4')).toBe('m.video');
    expect(msgTypeForMime('audio/ogg')).toBe('m.audio');
    expect(msgTypeForMime('application/zip')).toBe('m.file');
  });
});

describe('AttachmentResolver', () => {
  it('describes each file with the relay credential', async () => {
    const getFileInfo = vi.fn(async (_credential: string, fileId: string): Promise<FileInfo> => {
      const info = FILES[fileId];
      if (!info) throw new ApiError('not found', 404);
      return info;
    });
    const resolver = new AttachmentResolver(apiWith(getFileInfo), 'relay-token', createRecordingLogger());

    const attachments = await resolver.resolve(['file-img', 'file-doc']);

    expect(attachments).toEqual([
      { fileId: 'file-img', msgtype: 'm.image', body: 'cat.png', info: { mimetype: 'image/png', size: 512 } },
      {
        fileId: 'file-doc',
        msgtype: 'm.file',
        body: 'notes',
        info: { mimetype: 'application/octet-stream', size: 10 },
      },
    ]);
    expect(getFileInfo).toHaveBeenCalledWith('relay-token', 'file-img');
  });

  it('skips a file whose info cannot be read', async () => {
    const logger = createRecordingLogger();
    const resolver = new AttachmentResolver(
      apiWith(async (_credential, fileId) => {
        const info = FILES[fileId];
        if (!info) throw new ApiError('GET /files/file-gone/info failed with HTTP 404', 404);
        return info;
      }),
      'relay-token',
      logger,
    );

    const attachments = await resolver.resolve(['file-gone', 'file-img']);

    expect(attachments.map((a) => a.fileId)).toEqual(['file-img']);
    expect(logger.lines).toEqual([
      {
        level: 'error',
        context: 'attachments',
        message: 'Failed to get file info for file-gone: GET /files/file-gone/info failed with HTTP 404',
      },
    ]);
  });
});
