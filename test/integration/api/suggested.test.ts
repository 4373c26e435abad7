import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { CatalogMirrorRepository } from "../../../src/storage/repositories/catalog-mirror-repository.js";
import { SuggestedRepository } from "../../../src/storage/repositories/suggested-repository.js";
import { FOUNDATION_ISBN, catalogEntry, reason } from "../../support/fixtures.js";
import { jsonBody, testApplication, type TestApplication } from "../../support/app.js";

describe("/suggested", () => {
  let application: TestApplication;

  beforeEach(() => {
    application = testApplication();
    new CatalogMirrorRepository(application.db).replaceAll(
      [catalogEntry({ id: 1, title: "Foundation", isbns: [FOUNDATION_ISBN] })],
      "/library",
      "2026-03-01T10:00:00.000Z",
    );
    // ids 1 (Hyperion) and 2 (an owned Foundation)
    new SuggestedRepository(application.db).upsertMissing([
      { sourceKey: "101", book: { id: 101, title: "Hyperion" }, baseGenres: [], reasons: [reason()] },
      {
        sourceKey: "102",
        book: { id: 102, title: "Foundation", default_physical_edition: { isbn_13: FOUNDATION_ISBN } },
        baseGenres: [],
        reasons: [reason()],
      },
    ]);
  });

  afterEach(() => {
    application.dispose();
  });

  async function keys(path: string): Promise<unknown> {
    const res = await application.app.request(path);
    return res.json();
  }

  it("lists visible suggestions", async () => {
    expect(await keys("/suggested")).toMatchObject({ count: 2 });
  });

  it("moves suggestions between hidden, ignored and visible", async () => {
    const hide = await application.app.request("/suggested/hide", jsonBody("POST", { ids: [1] }));
    expect(await hide.json()).toEqual({ updated: 1 });

    const ignore = await application.app.request("/suggested/ignore", jsonBody("POST", { ids: ["2"] }));
    expect(await ignore.json()).toEqual({ updated: 1 });

    expect(await keys("/suggested")).toEqual({ count: 0, suggestions: [] });
    expect(await keys("/suggested/hidden")).toMatchObject({ count: 1, suggestions: [{ id: 1, sourceKey: "101" }] });
    expect(await keys("/suggested/ignored")).toMatchObject({ count: 1, suggestions: [{ id: 2, sourceKey: "102" }] });

    const unhide = await application.app.request("/suggested/unhide", jsonBody("POST", { ids: [1, 2] }));
    expect(await unhide.json()).toEqual({ updated: 2 });
    expect(await keys("/suggested")).toMatchObject({ count: 2 });
  });

  it("accepts hidden: 2 as ignore", async () => {
    await application.app.request("/suggested/hide", jsonBody("POST", { ids: [1], hidden: 2 }));

    expect(await keys("/suggested/ignored")).toMatchObject({ count: 1, suggestions: [{ id: 1 }] });
  });

  it("deletes suggestions by id", async () => {
    const res = await application.app.request("/suggested", jsonBody("DELETE", { ids: [1] }));

    expect(await res.json()).toEqual({ deleted: 1 });
    expect(await keys("/suggested")).toMatchObject({ count: 1, suggestions: [{ id: 2 }] });
  });

  it("ranks visible suggestions and drops the owned ones", async () => {
    const res = await application.app.request("/suggested/ranked");

    expect(await res.json()).toMatchObject({
      count: 1,
      removedOwned: 1,
      suggestions: [{ id: 1, sourceKey: "101", alreadyInCalibre: false }],
    });
    expect(await keys("/suggested")).toMatchObject({ count: 1 });
  });

  it("rejects a request without usable ids", async () => {
    const res = await application.app.request("/suggested/hide", jsonBody("POST", { ids: ["x", -1] }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "No valid ids provided.", type: "validation_error" });
  });

  it("rejects an unknown hidden value", async () => {
    const res = await application.app.request("/suggested/hide", jsonBody("POST", { ids: [1], hidden: 3 }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ type: "validation_error" });
  });

  it("rejects a body that is not JSON", async () => {
    const res = await application.app.request("/suggested/ignore", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{ids:",
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Request body must be valid JSON.", type: "validation_error" });
  });
});
