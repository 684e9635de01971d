import { Codec } from "../../codec/Codec";
import { t } from "../../codec/field-types";
import { TypeModel } from "../../codec/type-model";
import { CodecDefaults } from "../../codec/types";
import {
  httpBaseUrlRequiredError,
  httpStatusError,
  httpTimeoutError,
} from "../../errors";
import { Employee, employeeType } from "../../example/employee";
import { userSchema } from "../../example/user";
import {
  createJsonHttpClient,
  JsonHttpClient,
} from "../../http/json-http-client";
import { Logger } from "../../models/Logger";
import type { ILog } from "../../models/Logger";
import { captureRejection } from "../codec/test-utils";

interface RecordedRequest {
  url: string;
  init?: RequestInit;
}

const urlOf = (input: string | URL | Request): string =>
  typeof input === "string" ? input : input instanceof URL ? input.href : input.url;

const createFetch = (respond: (url: string, init?: RequestInit) => Response) => {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = urlOf(input);
    requests.push({ url, init });
    return respond(url, init);
  };
  return { fetchImpl, requests };
};

const USER_JSON =
  '{"id":1,"name":"Leanne Test","username":"leanne","email":"leanne@example.test","extra":true}';

describe("JsonHttpClient", () => {
  it("gets JSON and validates it with a schema", async () => {
    const { fetchImpl, requests } = createFetch(() => new Response(USER_JSON));
    const client = createJsonHttpClient({ baseUrl: "https://api.test", fetchImpl });

    const user = await client.fetchJson("users/1", userSchema);

    expect(user).toEqual({
      id: 1,
      name: "Leanne Test",
      username: "leanne",
      email: "leanne@example.test",
    });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe("https://api.test/users/1");
    expect(requests[0].init).toEqual({
      method: "GET",
      headers: { accept: "application/json" },
      body: undefined,
      signal: undefined,
    });
  });

  it("decodes into registered classes and field types", async () => {
    const codec = new Codec({
      defaults: CodecDefaults.Web,
      typeModel: new TypeModel(),
      types: [employeeType],
    });
    const { fetchImpl } = createFetch((url) =>
      url.endsWith("/numbers")
        ? new Response("[1,2]")
        : new Response('{"Name":"Jane","yearsEmployed":"3"}'),
    );
    const client = new JsonHttpClient({
      baseUrl: "https://api.test",
      codec,
      fetchImpl,
    });

    const employee = await client.fetchJson("employees/1", Employee);
    expect(employee).toBeInstanceOf(Employee);
    expect(employee.name).toBe("Jane");
    expect(employee.yearsEmployed).toBe(3);

    await expect(client.fetchJson("numbers", t.array(t.integer()))).resolves.toEqual([
      1, 2,
    ]);
    await expect(client.fetchJson("anything")).resolves.toEqual({
      Name: "Jane",
      yearsEmployed: "3",
    });
  });

  it("fails on error statuses with a preview of the body", async () => {
    const { fetchImpl } = createFetch(
      () => new Response("missing", { status: 404, statusText: "Not Found" }),
    );
    const logger = Logger.silent();
    const logs: ILog[] = [];
    logger.onLog((log) => logs.push(log));
    const client = new JsonHttpClient({
      baseUrl: "https://api.test",
      fetchImpl,
      logger,
    });

    const error = await captureRejection(client.fetchJson("users/9"));

    expect(httpStatusError.is(error)).toBe(true);
    expect(error).toHaveProperty(
      "message",
      "HTTP 404 Not Found for https://api.test/users/9",
    );
    expect(httpStatusError.is(error) && error.data.bodyPreview).toBe("missing");

    const warnings = logs.filter((log) => log.level === "warn");
    expect(warnings.map((log) => log.message)).toEqual([
      "GET https://api.test/users/9 answered 404",
    ]);
    expect(warnings[0].source).toBe("http.jsonClient");
  });

  it("posts encoded bodies and reports the status", async () => {
    const { fetchImpl, requests } = createFetch(
      () => new Response(null, { status: 201, statusText: "Created" }),
    );
    const client = createJsonHttpClient({
      baseUrl: "https://api.test/",
      fetchImpl,
      headers: { authorization: "Bearer test-secret" },
    });

    const result = await client.postJson("/users", { id: 1, name: "Leanne Test" });

    expect(result).toEqual({ status: 201, ok: true, statusText: "Created" });
    expect(requests[0].url).toBe("https://api.test/users");
    expect(requests[0].init?.method).toBe("POST");
    expect(requests[0].init?.body).toBe('{"id":1,"name":"Leanne Test"}');
    expect(requests[0].init?.headers).toEqual({
      accept: "application/json",
      authorization: "Bearer test-secret",
      "content-type": "application/json; charset=utf-8",
    });
  });

  it("reports failed posts without throwing", async () => {
    const { fetchImpl } = createFetch(
      () =>
        new Response("boom", { status: 500, statusText: "Internal Server Error" }),
    );
    const client = createJsonHttpClient({ baseUrl: "https://api.test", fetchImpl });

    await expect(client.postJson("users", {})).resolves.toEqual({
      status: 500,
      ok: false,
      statusText: "Internal Server Error",
    });
  });

  it("uses absolute URLs as given", async () => {
    const { fetchImpl, requests } = createFetch(() => new Response("{}"));
    const client = createJsonHttpClient({ baseUrl: "https://api.test", fetchImpl });

    await client.fetchJson("https://other.test/thing");
    expect(requests[0].url).toBe("https://other.test/thing");
  });

  it("requires a base URL", () => {
    let caught: unknown;
    try {
      createJsonHttpClient({ baseUrl: "" });
    } catch (error) {
      caught = error;
    }
    expect(httpBaseUrlRequiredError.is(caught)).toBe(true);
    expect(caught).toHaveProperty(
      "message",
      "createJsonHttpClient requires a baseUrl",
    );
  });

  it("aborts requests that outlive the timeout", async () => {
    const fetchImpl: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () =>
          reject(new Error("aborted")),
        );
      });
    const client = createJsonHttpClient({
      baseUrl: "https://api.test",
      fetchImpl,
      timeoutMs: 5,
    });

    const error = await captureRejection(client.fetchJson("slow"));
    expect(httpTimeoutError.is(error)).toBe(true);
    expect(error).toHaveProperty(
      "message",
      "Request to https://api.test/slow timed out after 5ms",
    );
  });

  it("passes network failures through", async () => {
    const failure = new TypeError("fetch failed");
    const fetchImpl: typeof fetch = async () => {
      throw failure;
    };
    const client = createJsonHttpClient({ baseUrl: "https://api.test", fetchImpl });

    await expect(client.fetchJson("users/1")).rejects.toBe(failure);
  });
});
