import type {
  ArticlePatch,
  ArticlePayload,
  RemoteArticle,
  ServiceKind,
} from "../types/index.js";

export interface ServiceCapabilities {
  /** Whether the service can hold unpublished drafts we can list back */
  drafts: boolean;
}

/**
 * One publishing platform. Every method rejects only with a ConnectorError.
 */
export interface ServiceConnector {
  readonly kind: ServiceKind;
  readonly capabilities: ServiceCapabilities;

  /** Complete listing; pagination stays inside the connector */
  listArticles(): Promise<RemoteArticle[]>;
  getArticle(id: string): Promise<RemoteArticle | null>;
  createArticle(
    payload: ArticlePayload,
    published: boolean
  ): Promise<RemoteArticle>;
  /** Sends only the fields present in `patch` */
  updateArticle(
    id: string,
    patch: ArticlePatch,
    published: boolean
  ): Promise<RemoteArticle>;
  /** Rejects with PermissionError or NotFoundError when it cannot delete */
  deleteArticle(id: string): Promise<void>;
}
