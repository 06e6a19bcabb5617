export type ActorItem = {
  id: string;
  role: "admin" | "member" | "guest";
  org_id: string;
  active: boolean;
};

export type PostItem = {
  id: string;
  title: string;
  owner_id: string | null;
  org_id: string;
  status: "draft" | "published" | "archived";
  score: number;
  author: { id: string | null; org_id: string } | null;
};

export type CommentItem = {
  id: string;
  post_id: string;
  author_id: string;
  body: string;
  post: { owner_id: string | null; status: PostItem["status"] };
};

let seq = 0;
const nextId = (prefix: string) => `${prefix}-${(seq += 1)}`;

export function makeActor(overrides: Partial<ActorItem> = {}): ActorItem {
  return {
    id: overrides.id ?? nextId("user"),
    role: overrides.role ?? "member",
    org_id: overrides.org_id ?? "org-1",
    active: overrides.active ?? true,
  };
}

export function makePost(overrides: Partial<PostItem> = {}): PostItem {
  const ownerId = overrides.owner_id === undefined ? "u1" : overrides.owner_id;
  const orgId = overrides.org_id ?? "org-1";
  return {
    id: overrides.id ?? nextId("post"),
    title: overrides.title ?? "Untitled",
    owner_id: ownerId,
    org_id: orgId,
    status: overrides.status ?? "published",
    score: overrides.score ?? 0,
    author: overrides.author === undefined ? { id: ownerId, org_id: orgId } : overrides.author,
  };
}

export function makeComment(overrides: Partial<CommentItem> = {}): CommentItem {
  return {
    id: overrides.id ?? nextId("comment"),
    post_id: overrides.post_id ?? "p1",
    author_id: overrides.author_id ?? "u1",
    body: overrides.body ?? "Nice post",
    post: overrides.post ?? { owner_id: "u1", status: "published" },
  };
}

/** Three posts: two owned by u1 (one published, one draft) and one owned by u2. */
export function seedPosts(): PostItem[] {
  return [
    makePost({ id: "p1", owner_id: "u1", status: "published", score: 10 }),
    makePost({ id: "p2", owner_id: "u2", status: "published", score: 5 }),
    makePost({ id: "p3", owner_id: "u1", status: "draft", score: 1 }),
  ];
}
