export interface ForumPost {
  id: string;
  createdAt: Date;
  authorEmail: string;
  authorName: string;
  title: string;
  body: string;
  locked: boolean;
  deleted: boolean;
}

export interface ForumReply {
  id: string;
  postId: string;
  createdAt: Date;
  authorEmail: string;
  authorName: string;
  body: string;
  deleted: boolean;
}

export interface ForumAuthor {
  email: string;
  name: string;
}
