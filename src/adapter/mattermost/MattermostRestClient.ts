import { z } from 'zod';
import type { Logger } from '../../infra/logger/logger.js';
import { ApiError } from '../../core/errors.js';
import type { CredentialVerifier, VerifiedAccount } from '../../core/puppet/PuppetReloadService.js';
import type {
  CreatePostInput,
  FileInfo,
  FileUpload,
  MattermostApi,
  MattermostUser,
  PostRef,
  UploadedFile,
} from './MattermostApi.js';

const UserResponse = z.object({
  id: z.string().min(1),
  username: z.string(),
});

const PostResponse = z.object({
  id: z.string().min(1),
  channel_id: z.string(),
});

const UploadResponse = z.object({
  file_infos: z.array(z.object({ id: z.string().min(1), name: z.string() })),
});

const FileInfoResponse = z.object({
  id: z.string().min(1),
  name: z.string(),
  mime_type: z.string().default(''),
  size: z.number().default(0),
});

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

interface RequestOptions {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  json?: unknown;
  form?: FormData;
}

/**
 * Mattermost REST v4 over fetch. Also serves as the credential verifier for
 * puppet reloads, since verification is just `GET /users/me`.
 */
export class MattermostRestClient implements MattermostApi, CredentialVerifier {
  private readonly baseUrl: string;
  // credential -> user id, filled by getMe; reactions and typing need the id in the path
  private readonly userIds = new Map<string, string>();

  constructor(
    serverUrl: string,
    private readonly logger: Logger,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.baseUrl = `${serverUrl.replace(/\/+$/, '')}/api/v4`;
  }

  async verify(credential: string): Promise<VerifiedAccount> {
    const me = await this.getMe(credential);
    return { userId: me.id, username: me.username };
  }

  async getMe(credential: string): Promise<MattermostUser> {
    const me = await this.request(credential, '/users/me', { method: 'GET' }, UserResponse);
    this.userIds.set(credential, me.id);
    return { id: me.id, username: me.username };
  }

  async createPost(credential: string, post: CreatePostInput): Promise<PostRef> {
    const created = await this.request(
      credential,
      '/posts',
      {
        method: 'POST',
        json: {
          channel_id: post.channelId,
          message: post.message,
          root_id: post.rootId ?? '',
          file_ids: post.fileIds ?? [],
        },
      },
      PostResponse,
    );
    return { id: created.id, channelId: created.channel_id };
  }

  async patchPost(credential: string, postId: string, message: string): Promise<PostRef> {
    const patched = await this.request(
      credential,
      `/posts/${encodeURIComponent(postId)}/patch`,
      { method: 'PUT', json: { message } },
      PostResponse,
    );
    return { id: patched.id, channelId: patched.channel_id };
  }

  async deletePost(credential: string, postId: string): Promise<void> {
    await this.request(credential, `/posts/${encodeURIComponent(postId)}`, { method: 'DELETE' });
  }

  async uploadFile(credential: string, channelId: string, file: FileUpload): Promise<UploadedFile> {
    const form = new FormData();
    form.append('channel_id', channelId);
    form.append('files', new Blob([file.data], { type: file.mimeType ?? 'application/octet-stream' }), file.name);

    const uploaded = await this.request(credential, '/files', { method: 'POST', form }, UploadResponse);
    const info = uploaded.file_infos[0];
    if (!info) {
      throw new ApiError('Upload returned no file info', 200);
    }
    return { id: info.id, name: info.name };
  }

  async getFileInfo(credential: string, fileId: string): Promise<FileInfo> {
    const info = await this.request(
      credential,
      `/files/${encodeURIComponent(fileId)}/info`,
      { method: 'GET' },
      FileInfoResponse,
    );
    return { id: info.id, name: info.name, mimeType: info.mime_type, size: info.size };
  }

  async saveReaction(credential: string, postId: string, emojiName: string): Promise<void> {
    const userId = await this.userIdFor(credential);
    await this.request(credential, '/reactions', {
      method: 'POST',
      json: { user_id: userId, post_id: postId, emoji_name: emojiName },
    });
  }

  async deleteReaction(credential: string, postId: string, emojiName: string): Promise<void> {
    const userId = await this.userIdFor(credential);
    const path = `/users/${encodeURIComponent(userId)}/posts/${encodeURIComponent(postId)}/reactions/${encodeURIComponent(emojiName)}`;
    await this.request(credential, path, { method: 'DELETE' });
  }

  async publishTyping(credential: string, channelId: string, parentId?: string): Promise<void> {
    const userId = await this.userIdFor(credential);
    await this.request(credential, `/users/${encodeURIComponent(userId)}/typing`, {
      method: 'POST',
      json: { channel_id: channelId, parent_id: parentId ?? '' },
    });
  }

  async viewChannel(credential: string, channelId: string): Promise<void> {
    const userId = await this.userIdFor(credential);
    await this.request(credential, `/channels/members/${encodeURIComponent(userId)}/view`, {
      method: 'POST',
      json: { channel_id: channelId },
    });
  }

  private async userIdFor(credential: string): Promise<string> {
    const cached = this.userIds.get(credential);
    if (cached) return cached;
    const me = await this.getMe(credential);
    return me.id;
  }

  private request(credential: string, path: string, options: RequestOptions): Promise<unknown>;
  private request<S extends z.ZodTypeAny>(
    credential: string,
    path: string,
    options: RequestOptions,
    schema: S,
  ): Promise<z.infer<S>>;
  private async request(
    credential: string,
    path: string,
    options: RequestOptions,
    schema?: z.ZodTypeAny,
  ): Promise<unknown> {
    const headers: Record<string, string> = { Authorization: `Bearer ${credential}` };
    let body: string | FormData | undefined;
    if (options.form) {
      body = options.form;
    } else if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: options.method,
      headers,
      body,
    });

    if (!response.ok) {
      const errorText = await response.text();
      this.logger.error(
        'mm-rest',
        `${options.method} ${path} failed (${response.status}): ${errorText.substring(0, 100)}`,
      );
      throw new ApiError(`${options.method} ${path} failed with HTTP ${response.status}`, response.status);
    }

    if (!schema) return undefined;

    const data: unknown = await response.json();
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new ApiError(`${options.method} ${path} returned an unexpected body`, response.status, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
