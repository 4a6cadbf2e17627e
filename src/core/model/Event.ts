import type { Post, PostEdited } from './Post.js';
import type { Status } from './Status.js';

export enum EventType {
  Hello = 'hello',
  Post = 'post',
  PostEdited = 'post.edited',
  Status = 'status',
  Unsupported = 'unsupported',
  Shutdown = 'shutdown',
}

export interface HelloEvent {
  readonly type: EventType.Hello;
  readonly serverString: string;
  readonly myUserId: string;
}

export interface PostEvent {
  readonly type: EventType.Post;
  readonly post: Post;
}

export interface PostEditedEvent {
  readonly type: EventType.PostEdited;
  readonly post: PostEdited;
}

export interface StatusEvent {
  readonly type: EventType.Status;
  readonly status: Status;
}

export interface UnsupportedEvent {
  readonly type: EventType.Unsupported;
  /** Undecoded backend payload, kept for logging */
  readonly raw: string;
}

export interface ShutdownEvent {
  readonly type: EventType.Shutdown;
}

export type Event =
  | HelloEvent
  | PostEvent
  | PostEditedEvent
  | StatusEvent
  | UnsupportedEvent
  | ShutdownEvent;
