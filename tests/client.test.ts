import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { DecodeError } from "../src/errors.js";
import { PagedTreeClient } from "../src/remote/client.js";

function clientReturning(body: string) {
  const urls: string[] = [];
  const client = new PagedTreeClient(
    {
      fetch: async (url: string) => {
        urls.push(url);
        return Buffer.from(body, "utf8");
      }
    },
    { baseUrl: "https://photos.example.test", apiKey: "test-key" }
  );
  return { client, urls };
}

describe("PagedTreeClient URLs", () => {
  const { client } = clientReturning("{}");

  it("builds the folder-children URL", () => {
    const url = new URL(client.folderChildrenUrl("n7Gq2", 51));
    assert.equal(url.origin, "https://photos.example.test");
    assert.equal(url.pathname, "/api/v2/node/n7Gq2!children");
    assert.equal(url.searchParams.get("APIKey"), "test-key");
    assert.equal(url.searchParams.get("_accept"), "application/json");
    assert.equal(url.searchParams.get("Type"), "Folder Album Page");
    assert.equal(url.searchParams.get("SortMethod"), "Organizer");
    assert.equal(url.searchParams.get("SortDirection"), "Descending");
    assert.equal(url.searchParams.get("count"), "50");
    assert.equal(url.searchParams.get("start"), "51");
    assert.equal(url.searchParams.get("_expand"), null);
  });

  it("builds the album-images URL with the largest-image expansion", () => {
    const url = new URL(client.albumImagesUrl("Xk3pQ", 1));
    assert.equal(url.pathname, "/api/v2/album/Xk3pQ!images");
    assert.equal(url.searchParams.get("start"), "1");
    assert.equal(url.searchParams.get("count"), "50");
    assert.equal(url.searchParams.get("_expand"), "LargestImage");
  });
});

describe("PagedTreeClient.listFolderChildren", () => {
  it("decodes folders, albums and unknown nodes", async () => {
    const { client, urls } = clientReturning(
      JSON.stringify({
        Response: {
          Node: [
            { Name: "Trips", Type: "Folder", NodeID: "f1" },
            { Name: "Beach", Type: "Album", NodeID: "a1", Uris: { Album: { Uri: "/api/v2/album/Xk3pQ" } } },
            { Name: "About", Type: "Page", NodeID: "p1" },
            { Name: "Broken", Type: "Album", NodeID: "a2" }
          ],
          Pages: { Total: 4, Start: 1, Count: 4 }
        }
      })
    );

    const page = await client.listFolderChildren("root", 1);

    assert.equal(urls.length, 1);
    assert.deepEqual(page, {
      items: [
        { kind: "Folder", name: "Trips", remoteId: "f1" },
        { kind: "Album", name: "Beach", remoteId: "a1", albumId: "Xk3pQ" },
        { kind: "Unknown", name: "About", remoteId: "p1", rawType: "Page" },
        { kind: "Unknown", name: "Broken", remoteId: "a2", rawType: "Album without album reference" }
      ],
      pageStart: 1,
      pageCount: 4,
      totalCount: 4
    });
  });

  it("treats a missing node list as an empty page", async () => {
    const { client } = clientReturning(JSON.stringify({ Response: { Pages: { Total: 0, Start: 1, Count: 0 } } }));
    const page = await client.listFolderChildren("root", 1);
    assert.deepEqual(page.items, []);
    assert.equal(page.totalCount, 0);
  });

  it("fails with DecodeError on a body that is not JSON", async () => {
    const { client } = clientReturning("<html>maintenance</html>");
    await assert.rejects(client.listFolderChildren("root", 1), DecodeError);
  });

  it("fails with DecodeError when the page cursor is missing", async () => {
    const { client } = clientReturning(JSON.stringify({ Response: { Node: [] } }));
    await assert.rejects(client.listFolderChildren("root", 1), (error) => {
      assert.ok(error instanceof DecodeError);
      assert.match(error.message, /Response\.Pages/);
      return true;
    });
  });
});

describe("PagedTreeClient.listAlbumImages", () => {
  it("resolves content from archived fields first, then from expansions", async () => {
    const { client } = clientReturning(
      JSON.stringify({
        Response: {
          AlbumImage: [
            {
              FileName: "A1.jpg",
              ArchivedUri: "https://cdn.example.test/archive/A1.jpg",
              ArchivedMD5: "aaaa",
              Uris: { LargestImage: { Uri: "/api/v2/image/k1!largestimage" } }
            },
            { FileName: "A2.jpg", Uris: { LargestImage: { Uri: "/api/v2/image/k2!largestimage" } } },
            { FileName: "A3.jpg", ArchivedUri: "https://cdn.example.test/archive/A3.jpg", ArchivedMD5: "", Uris: { LargestImage: { Uri: "/api/v2/image/k3!largestimage" } } },
            { FileName: "A4.jpg", Uris: { LargestImage: { Uri: "/api/v2/image/k4!largestimage" } } },
            { FileName: "A5.jpg" }
          ],
          Pages: { Total: 5, Start: 1, Count: 5 }
        },
        Expansions: {
          "/api/v2/image/k1!largestimage": { LargestImage: { Url: "https://cdn.example.test/L/A1.jpg", MD5: "1111" } },
          "/api/v2/image/k2!largestimage": { LargestImage: { Url: "https://cdn.example.test/L/A2.jpg", MD5: "2222" } },
          "/api/v2/image/k3!largestimage": { LargestImage: { Url: "https://cdn.example.test/L/A3.jpg", MD5: "3333" } }
        }
      })
    );

    const page = await client.listAlbumImages("Xk3pQ", 1);

    assert.deepEqual(page.items, [
      { remoteFileName: "A1.jpg", content: { hash: "aaaa", url: "https://cdn.example.test/archive/A1.jpg" } },
      { remoteFileName: "A2.jpg", content: { hash: "2222", url: "https://cdn.example.test/L/A2.jpg" } },
      { remoteFileName: "A3.jpg", content: { hash: "3333", url: "https://cdn.example.test/L/A3.jpg" } },
      { remoteFileName: "A4.jpg", content: undefined },
      { remoteFileName: "A5.jpg", content: undefined }
    ]);
    assert.equal(page.totalCount, 5);
  });

  it("fails with DecodeError when an image has no file name", async () => {
    const { client } = clientReturning(
      JSON.stringify({ Response: { AlbumImage: [{ ArchivedMD5: "aaaa" }], Pages: { Total: 1, Start: 1, Count: 1 } } })
    );
    await assert.rejects(client.listAlbumImages("Xk3pQ", 1), DecodeError);
  });
});
