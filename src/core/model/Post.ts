/**
 * A chat message as delivered by the backend adapter.
 * Handlers never mutate it; middleware may hand a transformed copy down the chain.
 */
export interface Post {
  readonly id: string;
  readonly channelId: string;
  readonly teamId: string;
  readonly userId: string;
  readonly message: string;
  /** Thread root, empty when the post starts a thread */
  readonly rootId: string;
  readonly parentId: string;
}

export interface PostEdited {
  readonly id: string;
  readonly channelId: string;
  readonly userId: string;
  readonly message: string;
  readonly rootId: string;
  readonly parentId: string;
}

export function createPost(overrides: Partial<Post> = {}): Post {
  return {
    id: '',
    channelId: '',
    teamId: '',
    userId: '',
    message: '',
    rootId: '',
    parentId: '',
    ...overrides,
  };
}
