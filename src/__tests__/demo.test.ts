import { createDemoCodec, runDemos, runEmployeeDemo, runPointDemo, runUserDemo } from "../demo";
import { createJsonHttpClient } from "../http/json-http-client";
import { Logger } from "../models/Logger";
import type { ILog } from "../models/Logger";

const EMPLOYEE_JSON = [
  "{",
  '  "$id": "1",',
  '  "name": "Jane Doe",',
  '  "reports": {',
  '    "$id": "2",',
  '    "$values": [',
  "      {",
  '        "$id": "3",',
  '        "name": "John Smith",',
  '        "manager": {',
  '          "$ref": "1"',
  "        },",
  '        "isManager": false',
  "      }",
  "    ]",
  "  },",
  '  "yearsEmployed": "10",',
  '  "isManager": true',
  "}",
].join("\n");

const POINT_LINES = [
  "X: 1",
  "Y: 2",
  "Additional values count: 2",
  "AdditionalValues[3]: 4",
  "AdditionalValues[5]: 6",
  "Description: No description provided.",
];

const createUserClient = () => {
  const methods: string[] = [];
  const fetchImpl: typeof fetch = async (_input, init) => {
    methods.push(init?.method ?? "GET");
    return init?.method === "POST"
      ? new Response(null, { status: 201, statusText: "Created" })
      : new Response(
          '{"id":1,"name":"Leanne Test","username":"leanne","email":"leanne@example.test"}',
        );
  };
  const client = createJsonHttpClient({ baseUrl: "https://api.test", fetchImpl });
  return { client, methods };
};

describe("demos", () => {
  it("preserves the manager cycle with numbers as strings", () => {
    expect(runEmployeeDemo(createDemoCodec())).toEqual([
      `Jane serialized: ${EMPLOYEE_JSON}`,
      "Whether Jane's first report's manager is Jane: true",
    ]);
  });

  it("rebuilds the point through its constructor", () => {
    expect(runPointDemo(createDemoCodec())).toEqual(POINT_LINES);
  });

  it("fetches a user and posts it back", async () => {
    const { client, methods } = createUserClient();

    await expect(runUserDemo(client)).resolves.toEqual([
      "Id: 1",
      "Name: Leanne Test",
      "Username: leanne",
      "Email: leanne@example.test",
      "Success - 201",
    ]);
    expect(methods).toEqual(["GET", "POST"]);
  });

  it("logs every line of the selected demos", async () => {
    const logger = Logger.silent();
    const logs: ILog[] = [];
    logger.onLog((log) => logs.push(log));
    const { client, methods } = createUserClient();

    await runDemos({
      codec: createDemoCodec(logger),
      client,
      logger,
      demos: [2],
    });

    const demoLogs = logs.filter((log) => log.source === "demo");
    expect(demoLogs.every((log) => log.level === "info")).toBe(true);
    expect(demoLogs.map((log) => log.message)).toEqual([
      "Starting demo 2",
      ...POINT_LINES,
    ]);
    expect(methods).toEqual([]);
  });
});
