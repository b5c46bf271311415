/**
 * Tests for category routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AppInstance } from "../src/app.js";
import { NOW, createFixture, createTestApp, idOf, jsonRequest } from "./setup.js";

let app: AppInstance["app"];

beforeEach(() => {
  ({ app } = createTestApp());
});

describe("category routes", () => {
  it("creates and fetches a category", async () => {
    const id = await idOf(await app.request(jsonRequest("/api/v1/categories", "POST", { name: "Travel" })));

    const res = await app.request(`/api/v1/categories/${String(id)}`);

    expect(await res.json()).toEqual({
      data: { id, userId: "local", name: "Travel", createdAt: NOW, updatedAt: NOW },
    });
  });

  it("rejects blank and duplicate names", async () => {
    await app.request(jsonRequest("/api/v1/categories", "POST", { name: "Travel" }));

    const blank = await app.request(jsonRequest("/api/v1/categories", "POST", { name: "   " }));
    const duplicate = await app.request(jsonRequest("/api/v1/categories", "POST", { name: "Travel" }));

    expect(blank.status).toBe(400);
    expect(await blank.json()).toMatchObject({ error: { details: { fields: { name: "Name must not be blank." } } } });
    expect(duplicate.status).toBe(400);
    expect(await duplicate.json()).toMatchObject({
      error: { message: "A category with this name already exists." },
    });
  });

  it("renames a category", async () => {
    const id = await idOf(await app.request(jsonRequest("/api/v1/categories", "POST", { name: "Travel" })));

    const res = await app.request(jsonRequest(`/api/v1/categories/${String(id)}`, "PATCH", { name: "Trips" }));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ data: { id, name: "Trips" } });
  });

  it("refuses to delete a category that expenses use", async () => {
    const fx = await createFixture(app);
    await app.request(
      jsonRequest("/api/v1/expenses", "POST", {
        accountId: fx.checking,
        categoryId: fx.food,
        amount: "5",
        description: "Coffee",
      }),
    );

    const res = await app.request(jsonRequest(`/api/v1/categories/${String(fx.food)}`, "DELETE"));

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: { code: "CATEGORY_IN_USE", message: "Category still has expenses; delete them first" },
    });
  });

  it("deletes an unused category", async () => {
    const id = await idOf(await app.request(jsonRequest("/api/v1/categories", "POST", { name: "Travel" })));

    const res = await app.request(jsonRequest(`/api/v1/categories/${String(id)}`, "DELETE"));

    expect(res.status).toBe(204);
    expect(await (await app.request("/api/v1/categories")).json()).toEqual({
      data: [],
      pagination: { cursor: null, hasMore: false },
    });
  });
});
