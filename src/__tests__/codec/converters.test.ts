import { describe, it, expect } from "@jest/globals";
import { Codec } from "../../codec/Codec";
import { createDefaultConverterRegistry } from "../../codec/converter-registry";
import { t } from "../../codec/field-types";
import { TypeModel } from "../../codec/type-model";
import { ReferenceHandling } from "../../codec/types";
import type { Converter, ConverterEntry } from "../../codec/types";
import { defineType } from "../../definers/builders/type";
import { converterRegistryError } from "../../errors";
import { captureError } from "./test-utils";

class Temperature {
  constructor(readonly celsius: number) {}
}

class Reading {
  first: Temperature | null = null;
  second: Temperature | null = null;
}

class Money {
  cents = 0;
}

class Note {
  text: string | null = null;
}

const centsConverter: Converter<number> = {
  encode: (value) => (value / 100).toFixed(2),
  decode: (token) => Math.round(Number(token) * 100),
};

const emptyTextConverter: Converter<string | null> = {
  handlesNull: true,
  encode: (value) => value,
  decode: (token) => (token === null ? "(empty)" : String(token)),
};

const temperatureConverter: ConverterEntry<Temperature> = {
  type: Temperature,
  encode: (value) => `${value.celsius}C`,
  decode: (token) => new Temperature(Number.parseFloat(String(token))),
};

const readingType = defineType(Reading)
  .field("first", t.nullable(t.object(() => Temperature)))
  .field("second", t.nullable(t.object(() => Temperature)))
  .build();

const moneyType = defineType(Money)
  .field("cents", t.integer(), { converter: centsConverter })
  .build();

const noteType = defineType(Note)
  .field("text", t.nullable(t.string()), { converter: emptyTextConverter })
  .build();

const createCodec = (preserve = false) =>
  new Codec({
    typeModel: new TypeModel(),
    converters: createDefaultConverterRegistry().register(temperatureConverter),
    types: [readingType, moneyType, noteType],
    options: preserve
      ? { referenceHandling: ReferenceHandling.Preserve }
      : undefined,
  });

const createReading = (): Reading => {
  const reading = new Reading();
  const temperature = new Temperature(21.5);
  reading.first = temperature;
  reading.second = temperature;
  return reading;
};

describe("converters", () => {
  it("lets a member converter own the value", () => {
    const money = new Money();
    money.cents = 150;
    const codec = createCodec();

    expect(codec.encode(money)).toBe('{"cents":"1.50"}');
    expect(codec.decode('{"cents":"2.25"}', Money).cents).toBe(225);
  });

  it("gives null to the zero value unless the converter handles null", () => {
    expect(createCodec().decode('{"cents":null}', Money).cents).toBe(0);
  });

  it("passes null and absent members to null-handling converters", () => {
    const codec = createCodec();
    expect(codec.decode("{}", Note).text).toBe("(empty)");
    expect(codec.decode('{"text":null}', Note).text).toBe("(empty)");
    expect(codec.decode('{"text":"hi"}', Note).text).toBe("hi");
    expect(codec.encode(new Note())).toBe('{"text":null}');
  });

  it("uses registered converters for declared types", () => {
    const codec = createCodec();
    const text = codec.encode(createReading());
    expect(text).toBe('{"first":"21.5C","second":"21.5C"}');

    const decoded = codec.decode(text, Reading);
    expect(decoded.first).toBeInstanceOf(Temperature);
    expect(decoded.first?.celsius).toBe(21.5);
    expect(decoded.second).not.toBe(decoded.first);
  });

  it("does not track identity for converter-owned values", () => {
    expect(createCodec(true).encode(createReading())).toBe(
      '{"$id":"1","first":"21.5C","second":"21.5C"}',
    );
  });

  it("finds converters for untyped values by their class", () => {
    expect(createCodec().encode([new Temperature(-3)])).toBe('["-3C"]');
  });

  it("supports converters for primitive kinds", () => {
    const codec = new Codec({
      typeModel: new TypeModel(),
      converters: createDefaultConverterRegistry().register({
        type: "boolean",
        encode: (value) => (value ? "yes" : "no"),
        decode: (token) => token === "yes",
      }),
    });
    expect(codec.encode({ on: true, off: false })).toBe('{"on":"yes","off":"no"}');
    expect(codec.decode('"yes"', t.boolean())).toBe(true);
  });

  it("locks the registry once a codec uses it", () => {
    const registry = createDefaultConverterRegistry();
    new Codec({ typeModel: new TypeModel(), converters: registry });

    const error = captureError(() =>
      registry.register({
        type: "string",
        encode: (value) => String(value),
        decode: (token) => String(token),
      }),
    );
    expect(converterRegistryError.is(error)).toBe(true);
    expect(error).toHaveProperty(
      "message",
      "Cannot register a converter for string: the registry is locked",
    );
  });
});
