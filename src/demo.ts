import { Codec } from "./codec/Codec";
import { TypeModel } from "./codec/type-model";
import {
  CodecDefaults,
  IgnoreCondition,
  NumberHandling,
  ReferenceHandling,
} from "./codec/types";
import { Employee, employeeType } from "./example/employee";
import { Point, pointType } from "./example/point";
import { userSchema } from "./example/user";
import type { JsonHttpClient } from "./http/json-http-client";
import type { Logger } from "./models/Logger";

/**
 * The options shared by every demo: web defaults with fields and indentation.
 */
export function createDemoCodec(logger?: Logger): Codec {
  return new Codec({
    defaults: CodecDefaults.Web,
    options: { includeFields: true, writeIndented: true },
    typeModel: new TypeModel(logger),
    types: [employeeType, pointType],
    logger,
  });
}

/**
 * A manager and a report pointing at each other, encoded with references
 * preserved and numbers written as strings.
 */
export function runEmployeeDemo(codec: Codec): string[] {
  const jane = new Employee();
  jane.name = "Jane Doe";
  jane.yearsEmployed = 10;

  const john = new Employee();
  john.name = "John Smith";

  jane.reports = [john];
  john.manager = jane;

  const options = codec.withOptions({
    defaultIgnoreCondition: IgnoreCondition.WhenWritingDefault,
    numberHandling:
      NumberHandling.AllowReadingFromString | NumberHandling.WriteAsString,
    referenceHandling: ReferenceHandling.Preserve,
  });

  const serialized = options.encode(jane, Employee);
  const decoded = options.decode(serialized, Employee);
  const firstReport = decoded.reports?.[0];

  return [
    `Jane serialized: ${serialized}`,
    `Whether Jane's first report's manager is Jane: ${firstReport?.manager === decoded}`,
  ];
}

/**
 * An immutable point rebuilt through its constructor, with an integer-keyed
 * dictionary and a converter that fills in missing descriptions.
 */
export function runPointDemo(codec: Codec): string[] {
  const point = new Point(1, 2);
  point.additionalValues = new Map([
    [3, 4],
    [5, 6],
  ]);

  const serialized = codec.encode(point, Point);
  const decoded = codec.decode(serialized, Point);
  const values = decoded.additionalValues;

  return [
    `X: ${decoded.x}`,
    `Y: ${decoded.y}`,
    `Additional values count: ${values?.size ?? 0}`,
    `AdditionalValues[3]: ${values?.get(3)}`,
    `AdditionalValues[5]: ${values?.get(5)}`,
    `Description: ${decoded.description}`,
  ];
}

/**
 * Fetches a user and posts it back through the JSON helper.
 */
export async function runUserDemo(
  client: JsonHttpClient,
  userId = 1,
): Promise<string[]> {
  const user = await client.fetchJson(`users/${userId}`, userSchema);
  const response = await client.postJson("users", user);

  return [
    `Id: ${user.id}`,
    `Name: ${user.name}`,
    `Username: ${user.username}`,
    `Email: ${user.email}`,
    `${response.ok ? "Success" : "Error"} - ${response.status}`,
  ];
}

export interface DemoRunOptions {
  codec: Codec;
  client: JsonHttpClient;
  logger: Logger;
  /** Demo numbers to run, in order */
  demos?: readonly number[];
}

/**
 * Runs the demos in order and logs every line at info.
 */
export async function runDemos(options: DemoRunOptions): Promise<void> {
  const { codec, client, logger } = options;
  const demos = options.demos ?? [1, 2, 3];
  const log = logger.with({ source: "demo" });

  for (const demo of demos) {
    log.info(`Starting demo ${demo}`);
    const lines =
      demo === 1
        ? runEmployeeDemo(codec)
        : demo === 2
          ? runPointDemo(codec)
          : await runUserDemo(client);
    for (const line of lines) {
      log.info(line);
    }
  }
}
