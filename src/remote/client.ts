import { z } from "zod";
import { DecodeError } from "../errors.js";
import type { ImageContent, ImageRecord, Page, TreeNode } from "../types.js";
import type { RetryingFetcher } from "./fetcher.js";

export const PAGE_SIZE = 50;
export const FIRST_PAGE_START = 1;
/** Placeholder total used until the first page of a listing has been read. */
export const UNKNOWN_TOTAL = 0xffff;

const ALBUM_URI_PREFIX = "/api/v2/album/";

const pagesSchema = z.object({
  Total: z.number().int().min(0),
  Start: z.number().int(),
  Count: z.number().int().min(0)
});

const nodeSchema = z.object({
  Name: z.string(),
  Type: z.string(),
  NodeID: z.string(),
  Uris: z
    .object({
      Album: z.object({ Uri: z.string() }).optional()
    })
    .optional()
});

const folderResponseSchema = z.object({
  Response: z.object({
    Node: z.array(nodeSchema).optional().default([]),
    Pages: pagesSchema
  })
});

const imageSchema = z.object({
  FileName: z.string(),
  ArchivedUri: z.string().optional(),
  ArchivedMD5: z.string().optional(),
  Uris: z
    .object({
      LargestImage: z.object({ Uri: z.string() }).optional()
    })
    .optional()
});

const albumResponseSchema = z.object({
  Response: z.object({
    AlbumImage: z.array(imageSchema).optional().default([]),
    Pages: pagesSchema
  }),
  Expansions: z
    .record(
      z.object({
        LargestImage: z
          .object({
            Url: z.string().optional(),
            MD5: z.string().optional()
          })
          .optional()
      })
    )
    .optional()
    .default({})
});

type RawNode = z.infer<typeof nodeSchema>;
type RawImage = z.infer<typeof imageSchema>;
type Expansions = z.infer<typeof albumResponseSchema>["Expansions"];

export interface PagedTreeClientOptions {
  baseUrl: string;
  apiKey: string;
}

/** Reads folder-children and album-image listings, one page per call. */
export class PagedTreeClient {
  constructor(
    private readonly fetcher: Pick<RetryingFetcher, "fetch">,
    private readonly options: PagedTreeClientOptions
  ) {}

  folderChildrenUrl(nodeId: string, start: number): string {
    const url = new URL(`${this.options.baseUrl}/api/v2/node/${encodeURIComponent(nodeId)}!children`);
    url.search = this.listingQuery(start).toString();
    return url.toString();
  }

  albumImagesUrl(albumId: string, start: number): string {
    const url = new URL(`${this.options.baseUrl}/api/v2/album/${encodeURIComponent(albumId)}!images`);
    const query = this.listingQuery(start);
    query.set("_expand", "LargestImage");
    url.search = query.toString();
    return url.toString();
  }

  async listFolderChildren(nodeId: string, start: number): Promise<Page<TreeNode>> {
    const url = this.folderChildrenUrl(nodeId, start);
    const raw = await this.requestJson(url);
    const parsed = folderResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DecodeError(url, formatIssues(parsed.error));
    }

    const { Node, Pages } = parsed.data.Response;
    return {
      items: Node.map(toTreeNode),
      pageStart: Pages.Start,
      pageCount: Pages.Count,
      totalCount: Pages.Total
    };
  }

  async listAlbumImages(albumId: string, start: number): Promise<Page<ImageRecord>> {
    const url = this.albumImagesUrl(albumId, start);
    const raw = await this.requestJson(url);
    const parsed = albumResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DecodeError(url, formatIssues(parsed.error));
    }

    const { AlbumImage, Pages } = parsed.data.Response;
    const expansions = parsed.data.Expansions;
    return {
      items: AlbumImage.map((image) => ({
        remoteFileName: image.FileName,
        content: resolveImageContent(image, expansions)
      })),
      pageStart: Pages.Start,
      pageCount: Pages.Count,
      totalCount: Pages.Total
    };
  }

  private listingQuery(start: number): URLSearchParams {
    return new URLSearchParams({
      APIKey: this.options.apiKey,
      _accept: "application/json",
      Type: "Folder Album Page",
      SortMethod: "Organizer",
      SortDirection: "Descending",
      count: String(PAGE_SIZE),
      start: String(start)
    });
  }

  private async requestJson(url: string): Promise<unknown> {
    const body = await this.fetcher.fetch(url);
    try {
      return JSON.parse(body.toString("utf8"));
    } catch (error) {
      throw new DecodeError(url, "body is not valid JSON", error);
    }
  }
}

function toTreeNode(node: RawNode): TreeNode {
  switch (node.Type) {
    case "Folder":
      return { kind: "Folder", name: node.Name, remoteId: node.NodeID };
    case "Album": {
      const albumUri = node.Uris?.Album?.Uri;
      if (!albumUri) {
        return { kind: "Unknown", name: node.Name, remoteId: node.NodeID, rawType: "Album without album reference" };
      }
      const albumId = albumUri.startsWith(ALBUM_URI_PREFIX) ? albumUri.slice(ALBUM_URI_PREFIX.length) : albumUri;
      return { kind: "Album", name: node.Name, remoteId: node.NodeID, albumId };
    }
    default:
      return { kind: "Unknown", name: node.Name, remoteId: node.NodeID, rawType: node.Type };
  }
}

/** Archived fields win; otherwise the largest-image expansion for this image is used. */
function resolveImageContent(image: RawImage, expansions: Expansions): ImageContent | undefined {
  if (image.ArchivedUri && image.ArchivedMD5) {
    return { hash: image.ArchivedMD5, url: image.ArchivedUri };
  }

  const uri = image.Uris?.LargestImage?.Uri;
  if (!uri) return undefined;

  const largest = expansions[uri]?.LargestImage;
  if (!largest?.Url || !largest.MD5) return undefined;
  return { hash: largest.MD5, url: largest.Url };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`).join("; ");
}
