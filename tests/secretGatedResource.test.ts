import {
  ResourceCache,
  SecretGatedResourceDefinition,
  SecretProvider,
} from "../src/secretGatedResource";
import { ResourceCycleError, SecretUnavailableError } from "../src/errors";

interface FakeClient {
  id: number;
  apiKey: string;
}

describe("ResourceCache", () => {
  let created: number;
  let prompts: string[];
  let definition: SecretGatedResourceDefinition<FakeClient>;
  let secrets: SecretProvider;

  beforeEach(() => {
    created = 0;
    prompts = [];
    definition = {
      secretName: "TEST_TOKEN",
      prompt: "Add TEST_TOKEN to your .env file",
      create: (apiKey) => ({ id: ++created, apiKey }),
    };
    secrets = async (envVar, _prompt) => {
      prompts.push(envVar);
      return "test-secret";
    };
  });

  it("returns the identical instance and asks for the secret once", async () => {
    const cache = new ResourceCache<FakeClient>();

    const first = await cache.acquire("client", definition, secrets);
    const second = await cache.acquire("client", definition, secrets);

    expect(second).toBe(first);
    expect(first).toEqual({ id: 1, apiKey: "test-secret" });
    expect(prompts).toEqual(["TEST_TOKEN"]);
  });

  it("shares one construction between concurrent first callers", async () => {
    const cache = new ResourceCache<FakeClient>();

    const [a, b, c] = await Promise.all([
      cache.acquire("client", definition, secrets),
      cache.acquire("client", definition, secrets),
      cache.acquire("client", definition, secrets),
    ]);

    expect(a).toBe(b);
    expect(b).toBe(c);
    expect(created).toBe(1);
    expect(prompts).toEqual(["TEST_TOKEN"]);
  });

  it("exposes a ready value synchronously through peek", async () => {
    const cache = new ResourceCache<FakeClient>();
    expect(cache.peek("client")).toBeUndefined();

    const pending = cache.acquire("client", definition, secrets);
    expect(cache.peek("client")).toBeUndefined();
    expect(cache.isReady("client")).toBe(false);

    const value = await pending;
    expect(cache.peek("client")).toBe(value);
    expect(cache.isReady("client")).toBe(true);
  });

  it("does not cache a failed construction", async () => {
    const cache = new ResourceCache<FakeClient>();
    let available = false;
    const flakySecrets: SecretProvider = async (envVar) => {
      prompts.push(envVar);
      if (!available) throw new SecretUnavailableError(envVar);
      return "test-secret";
    };

    await expect(cache.acquire("client", definition, flakySecrets)).rejects.toBeInstanceOf(
      SecretUnavailableError
    );
    expect(created).toBe(0);

    available = true;
    const value = await cache.acquire("client", definition, flakySecrets);
    expect(value.id).toBe(1);
    expect(prompts).toEqual(["TEST_TOKEN", "TEST_TOKEN"]);
  });

  it("keeps keys independent", async () => {
    const cache = new ResourceCache<FakeClient>();
    const a = await cache.acquire("a", definition, secrets);
    const b = await cache.acquire("b", definition, secrets);
    expect(a).not.toBe(b);
    expect(created).toBe(2);
  });

  it("rejects a construction that asks for its own key", async () => {
    const cache = new ResourceCache<FakeClient>();
    const selfReferencing: SecretGatedResourceDefinition<FakeClient> = {
      secretName: "TEST_TOKEN",
      prompt: "",
      create: () => cache.acquire("loop", selfReferencing, secrets),
    };

    await expect(cache.acquire("loop", selfReferencing, secrets)).rejects.toBeInstanceOf(
      ResourceCycleError
    );
    expect(cache.isReady("loop")).toBe(false);
  });

  it("rejects constructions in separate flows that wait on each other", async () => {
    const cache = new ResourceCache<FakeClient>();
    let started = 0;
    let openBarrier: () => void = () => undefined;
    const barrier = new Promise<void>((resolve) => {
      openBarrier = resolve;
    });
    const dependingOn = (other: string): SecretGatedResourceDefinition<FakeClient> => ({
      secretName: "TEST_TOKEN",
      prompt: "",
      create: async () => {
        started++;
        if (started === 2) openBarrier();
        await barrier;
        return cache.acquire(other, definitions[other], secrets);
      },
    });
    const definitions: Record<string, SecretGatedResourceDefinition<FakeClient>> = {
      a: dependingOn("b"),
      b: dependingOn("a"),
    };

    const results = await Promise.allSettled([
      cache.acquire("a", definitions.a, secrets),
      cache.acquire("b", definitions.b, secrets),
    ]);

    for (const result of results) {
      expect(result.status).toBe("rejected");
      if (result.status === "rejected") {
        expect(result.reason).toBeInstanceOf(ResourceCycleError);
      }
    }
    expect(cache.isReady("a")).toBe(false);
    expect(cache.isReady("b")).toBe(false);
  });

  it("allows one resource to be built from another", async () => {
    const cache = new ResourceCache<FakeClient>();
    const derived: SecretGatedResourceDefinition<FakeClient> = {
      secretName: "OTHER_TOKEN",
      prompt: "",
      create: async () => {
        const base = await cache.acquire("base", definition, secrets);
        return { id: base.id + 100, apiKey: base.apiKey };
      },
    };

    const value = await cache.acquire("derived", derived, secrets);
    expect(value).toEqual({ id: 101, apiKey: "test-secret" });
    expect(prompts).toEqual(["OTHER_TOKEN", "TEST_TOKEN"]);
  });
});
