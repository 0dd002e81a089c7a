/**
 * Mattermost REST operations the bridge performs. Every call takes the
 * credential chosen for that send; there is no default account.
 */
export interface MattermostApi {
  getMe(credential: string): Promise<MattermostUser>;
  createPost(credential: string, post: CreatePostInput): Promise<PostRef>;
  patchPost(credential: string, postId: string, message: string): Promise<PostRef>;
  deletePost(credential: string, postId: string): Promise<void>;
  uploadFile(credential: string, channelId: string, file: FileUpload): Promise<UploadedFile>;
  getFileInfo(credential: string, fileId: string): Promise<FileInfo>;
  saveReaction(credential: string, postId: string, emojiName: string): Promise<void>;
  deleteReaction(credential: string, postId: string, emojiName: string): Promise<void>;
  publishTyping(credential: string, channelId: string, parentId?: string): Promise<void>;
  viewChannel(credential: string, channelId: string): Promise<void>;
}

export interface MattermostUser {
  id: string;
  username: string;
}

export interface CreatePostInput {
  channelId: string;
  message: string;
  rootId?: string;
  fileIds?: string[];
}

export interface PostRef {
  id: string;
  channelId: string;
}

export interface FileUpload {
  name: string;
  data: Uint8Array;
  mimeType?: string;
}

export interface UploadedFile {
  id: string;
  name: string;
}

export interface FileInfo {
  id: string;
  name: string;
  mimeType: string;
  size: number;
}
