import test from "node:test";
import assert from "node:assert";
import { http, HttpResponse } from "msw";
import { GitHubApiClient } from "./client.js";
import { UNKNOWN_USER, UserCache, formatUser, resolveUser } from "./users.js";
import { GitHubApiError } from "../errors.js";
import { useMockGitHub } from "../../test/msw-setup.js";
import { API, TEST_TOKEN, userHandlers, userUrl } from "../../test/fixtures.js";

const server = useMockGitHub();
const client = new GitHubApiClient(TEST_TOKEN);

test("resolving the same profile twice issues one request", async () => {
  const hits = new Map<string, number>();
  server.use(...userHandlers(hits));
  const cache = new UserCache();

  const first = await resolveUser(client, cache, userUrl("alice"));
  const second = await resolveUser(client, cache, userUrl("alice"));

  assert.strictEqual(hits.get("alice"), 1);
  assert.strictEqual(cache.size, 1);
  assert.deepStrictEqual(first, { kind: "known", login: "alice", name: "Alice Example" });
  assert.strictEqual(second, first);
});

test("separate caches do not share profiles", async () => {
  const hits = new Map<string, number>();
  server.use(...userHandlers(hits));

  await resolveUser(client, new UserCache(), userUrl("bob"));
  await resolveUser(client, new UserCache(), userUrl("bob"));

  assert.strictEqual(hits.get("bob"), 2);
});

test("a profile without a name displays its login", async () => {
  server.use(...userHandlers());
  const identity = await resolveUser(client, new UserCache(), userUrl("bob"));
  assert.strictEqual(formatUser(identity), "bob");
});

test("a profile body without a login resolves to the unknown identity", async () => {
  server.use(http.get(`${API}/users/ghost`, () => HttpResponse.json({ name: 42 })));
  const cache = new UserCache();

  const identity = await resolveUser(client, cache, userUrl("ghost"));

  assert.deepStrictEqual(identity, UNKNOWN_USER);
  assert.strictEqual(formatUser(identity), "None");
  assert.deepStrictEqual(cache.get(userUrl("ghost")), UNKNOWN_USER);
});

test("a deleted profile resolves to the unknown identity once", async () => {
  const hits = new Map<string, number>();
  server.use(...userHandlers(hits));
  const cache = new UserCache();

  const first = await resolveUser(client, cache, userUrl("nobody"));
  const second = await resolveUser(client, cache, userUrl("nobody"));

  assert.strictEqual(formatUser(first), "None");
  assert.strictEqual(second, UNKNOWN_USER);
  assert.strictEqual(hits.get("nobody"), 1);
});

test("a server error while resolving a profile propagates", async () => {
  server.use(
    http.get(`${API}/users/:login`, () => HttpResponse.json({ message: "Server Error" }, { status: 500 }))
  );

  await assert.rejects(resolveUser(client, new UserCache(), userUrl("alice")), (error: unknown) => {
    assert.ok(error instanceof GitHubApiError);
    assert.strictEqual(error.status, 500);
    return true;
  });
});

test("an unauthorized profile request propagates", async () => {
  server.use(http.get(`${API}/users/:login`, () => HttpResponse.json({ message: "Bad credentials" }, { status: 401 })));

  await assert.rejects(resolveUser(client, new UserCache(), userUrl("alice")), GitHubApiError);
});

test("formatUser prefers a non-empty name", () => {
  assert.strictEqual(formatUser({ kind: "known", login: "carol", name: "Carol" }), "Carol");
  assert.strictEqual(formatUser({ kind: "known", login: "carol", name: "" }), "carol");
});
