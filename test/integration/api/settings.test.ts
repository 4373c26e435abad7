import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { catalogEntry } from "../../support/fixtures.js";
import { jsonBody, staticReader, testApplication, type TestApplication } from "../../support/app.js";

describe("/settings", () => {
  let application: TestApplication;

  beforeEach(() => {
    application = testApplication({ catalogReader: staticReader([catalogEntry({ id: 1, title: "Dune" })]) });
  });

  afterEach(() => {
    application.dispose();
  });

  it("starts from defaults", async () => {
    const res = await application.app.request("/settings");

    expect(await res.json()).toEqual({ calibreLibraryPath: null, hardcoverListId: null });
  });

  it("merges a partial update", async () => {
    await application.app.request("/settings", jsonBody("PUT", { calibreLibraryPath: " /library " }));
    const res = await application.app.request("/settings", jsonBody("PUT", { hardcoverListId: 77 }));

    expect(await res.json()).toEqual({ calibreLibraryPath: "/library", hardcoverListId: 77 });
  });

  it("rejects a malformed value", async () => {
    const res = await application.app.request("/settings", jsonBody("PUT", { hardcoverListId: "x" }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid settings: hardcoverListId Expected number, received string",
      type: "validation_error",
    });
  });
});

describe("/activity", () => {
  let application: TestApplication;

  beforeEach(() => {
    application = testApplication({ catalogReader: staticReader([catalogEntry({ id: 1, title: "Dune" })]) });
  });

  afterEach(() => {
    application.dispose();
  });

  it("shows what the services recorded, newest first", async () => {
    await application.app.request("/calibre/sync", { method: "POST" });
    await application.app.request("/settings", jsonBody("PUT", { calibreLibraryPath: "/library" }));
    await application.app.request("/calibre/sync", { method: "POST" });

    const res = await application.app.request("/activity");

    expect(await res.json()).toMatchObject({
      count: 2,
      entries: [
        { source: "Calibre sync", level: "success", message: "Mirrored 1 books (+1 / -0)." },
        { source: "Calibre sync", level: "warning", message: "Calibre path not configured." },
      ],
    });
  });

  it("limits the entries with take", async () => {
    await application.app.request("/calibre/sync", { method: "POST" });
    await application.app.request("/calibre/sync", { method: "POST" });

    const res = await application.app.request("/activity?take=1");

    expect(await res.json()).toMatchObject({ count: 1 });
  });
});
