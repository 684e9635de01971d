import { describe, it, expect } from "@jest/globals";
import { Codec } from "../../codec/Codec";
import { t } from "../../codec/field-types";
import { TypeModel } from "../../codec/type-model";
import { ReferenceHandling } from "../../codec/types";
import { defineType } from "../../definers/builders/type";
import {
  cycleDetectedError,
  danglingReferenceError,
  referenceMetadataError,
  typeMismatchError,
} from "../../errors";
import { Address, fixtureTypes, Pair, TreeNode } from "./fixtures";
import { captureError } from "./test-utils";

class Holder {
  data: Record<string, unknown> = {};
  map = new Map<string, number>();
}

class Shelf {
  pinned: Address | null = null;
  other: Address | null = null;
}

const holderType = defineType(Holder)
  .field("data", t.record(t.unknown()))
  .field("map", t.dictionary(t.string(), t.integer()))
  .build();

const shelfType = defineType(Shelf)
  .field("pinned", t.nullable(t.object(() => Address)), { readOnly: true })
  .field("other", t.nullable(t.object(() => Address)))
  .build();

const createCodec = (preserve: boolean) =>
  new Codec({
    typeModel: new TypeModel(),
    types: [...fixtureTypes, holderType, shelfType],
    options: {
      referenceHandling: preserve
        ? ReferenceHandling.Preserve
        : ReferenceHandling.None,
    },
  });

const createTree = (): TreeNode => {
  const root = new TreeNode();
  root.label = "root";
  const leaf = new TreeNode();
  leaf.label = "a";
  leaf.parent = root;
  root.children = [leaf];
  return root;
};

const createSharedPair = (): Pair => {
  const address = new Address();
  address.street = "S";
  address.city = "C";
  const pair = new Pair();
  pair.left = address;
  pair.right = address;
  return pair;
};

const CYCLIC_TREE =
  '{"$id":"1","label":"root","parent":null,"children":{"$id":"2","$values":[{"$id":"3","label":"a","parent":{"$ref":"1"},"children":{"$id":"4","$values":[]}}]}}';

describe("reference preservation", () => {
  it("writes $id first and $ref for repeated objects", () => {
    expect(createCodec(true).encode(createTree(), TreeNode)).toBe(CYCLIC_TREE);
  });

  it("restores cycles on decode", () => {
    const root = createCodec(true).decode(CYCLIC_TREE, TreeNode);
    const [leaf] = root.children;

    expect(root.label).toBe("root");
    expect(leaf).toBeInstanceOf(TreeNode);
    expect(leaf.parent).toBe(root);
    expect(leaf.children).toEqual([]);
  });

  it("keeps shared objects shared", () => {
    const codec = createCodec(true);
    const text = codec.encode(createSharedPair());
    expect(text).toBe(
      '{"$id":"1","left":{"$id":"2","street":"S","city":"C"},"right":{"$ref":"2"}}',
    );

    const decoded = codec.decode(text, Pair);
    expect(decoded.left).toBeInstanceOf(Address);
    expect(decoded.right).toBe(decoded.left);
  });

  it("resolves references that appear before their object", () => {
    const decoded = createCodec(true).decode(
      '{"$id":"1","left":{"$ref":"2"},"right":{"$id":"2","street":"S","city":"C"}}',
      Pair,
    );
    expect(decoded.right?.street).toBe("S");
    expect(decoded.left).toBe(decoded.right);
  });

  it("resolves self references inside arrays", () => {
    const list = createCodec(true).decode(
      '{"$id":"1","$values":[{"$ref":"1"},2]}',
    );
    expect(Array.isArray(list)).toBe(true);
    expect(Array.isArray(list) && list[0]).toBe(list);
    expect(Array.isArray(list) && list[1]).toBe(2);
  });

  it("reports references that never resolve", () => {
    const error = captureError(() =>
      createCodec(true).decode('{"$id":"1","left":{"$ref":"7"},"right":null}', Pair),
    );
    expect(danglingReferenceError.is(error)).toBe(true);
    expect(error).toHaveProperty(
      "message",
      'Reference "7" at $.left does not resolve to an object with that $id',
    );
  });

  it("rejects malformed metadata", () => {
    const codec = createCodec(true);
    const extraKeys = captureError(() =>
      codec.decode('{"left":{"$ref":"1","street":"x"}}', Pair),
    );
    expect(referenceMetadataError.is(extraKeys)).toBe(true);
    expect(extraKeys).toHaveProperty(
      "message",
      "A $ref object must hold only a string $ref at $.left",
    );

    expect(() =>
      codec.decode('{"$id":"1","left":{"$id":"1","street":"a","city":"b"}}', Pair),
    ).toThrow('Duplicate $id "1" at $.left');
    expect(() => codec.decode('{"$id":1}', Pair)).toThrow(
      "The $id value must be a string at $",
    );
    expect(() => codec.decode('{"$id":"1","$values":[]}', Pair)).toThrow(
      "Unexpected $values in an object at $",
    );
    expect(() =>
      codec.decode('{"$id":"1","$values":[],"x":1}', t.array(t.integer())),
    ).toThrow("A preserved array must hold only $id and $values at $");
  });

  it("rejects references to objects of another type", () => {
    const error = captureError(() =>
      createCodec(true).decode('{"$id":"1","left":{"$ref":"1"}}', Pair),
    );
    expect(typeMismatchError.is(error)).toBe(true);
    expect(error).toHaveProperty(
      "message",
      "Expected Address at $.left but found Pair",
    );
  });

  it("treats metadata as ordinary members when references are off", () => {
    const decoded = createCodec(false).decode('{"$id":"1","left":null}', Pair);
    expect(decoded.left).toBeNull();
  });
});

describe("user keys shaped like metadata", () => {
  const createHolder = (): Holder => {
    const holder = new Holder();
    holder.data = { $ref: "x", $id: "y", $$id: "z" };
    holder.map = new Map([
      ["$id", 7],
      ["$values", 8],
    ]);
    return holder;
  };

  const ESCAPED_HOLDER =
    '{"$id":"1","data":{"$id":"2","$$ref":"x","$$id":"y","$$$id":"z"},"map":{"$id":"3","$$id":7,"$$values":8}}';

  it("escapes record and map keys next to the container's own $id", () => {
    expect(createCodec(true).encode(createHolder())).toBe(ESCAPED_HOLDER);
  });

  it("restores the original keys on decode", () => {
    const decoded = createCodec(true).decode(ESCAPED_HOLDER, Holder);
    expect(decoded.data).toEqual({ $ref: "x", $id: "y", $$id: "z" });
    expect([...decoded.map]).toEqual([
      ["$id", 7],
      ["$values", 8],
    ]);
  });

  it("leaves keys alone when references are off", () => {
    const codec = createCodec(false);
    const text = codec.encode(createHolder());
    expect(text).toBe(
      '{"data":{"$ref":"x","$id":"y","$$id":"z"},"map":{"$id":7,"$values":8}}',
    );
    expect(codec.decode(text, Holder).data).toEqual({
      $ref: "x",
      $id: "y",
      $$id: "z",
    });
  });
});

describe("read-only members", () => {
  const createShelf = (): Shelf => {
    const address = new Address();
    address.street = "S";
    address.city = "C";
    const shelf = new Shelf();
    shelf.pinned = address;
    shelf.other = address;
    return shelf;
  };

  it("registers the $id of a skipped member for later references", () => {
    const codec = createCodec(true);
    const text = codec.encode(createShelf());
    expect(text).toBe(
      '{"$id":"1","pinned":{"$id":"2","street":"S","city":"C"},"other":{"$ref":"2"}}',
    );

    const decoded = codec.decode(text, Shelf);
    expect(decoded.pinned).toBeNull();
    expect(decoded.other).toBeInstanceOf(Address);
    expect(decoded.other?.street).toBe("S");
  });

  it("resolves references that point forward into a skipped member", () => {
    const decoded = createCodec(true).decode(
      '{"other":{"$ref":"2"},"pinned":{"$id":"2","street":"S","city":"C"}}',
      Shelf,
    );
    expect(decoded.pinned).toBeNull();
    expect(decoded.other?.city).toBe("C");
  });

  it("still reports dangling references inside a skipped member", () => {
    const error = captureError(() =>
      createCodec(true).decode('{"pinned":{"$ref":"9"}}', Shelf),
    );
    expect(danglingReferenceError.is(error)).toBe(true);
    expect(error).toHaveProperty(
      "message",
      'Reference "9" at $.pinned does not resolve to an object with that $id',
    );
  });
});

describe("without reference preservation", () => {
  it("rejects cycles with the path where the cycle closes", () => {
    const error = captureError(() =>
      createCodec(false).encode(createTree(), TreeNode),
    );
    expect(cycleDetectedError.is(error)).toBe(true);
    expect(error).toHaveProperty(
      "message",
      "A cycle was detected at $.children[0].parent: the TreeNode is already being encoded",
    );
  });

  it("writes shared objects once per occurrence", () => {
    expect(createCodec(false).encode(createSharedPair())).toBe(
      '{"left":{"street":"S","city":"C"},"right":{"street":"S","city":"C"}}',
    );
  });

  it("rejects an array that contains itself", () => {
    const list: unknown[] = [];
    list.push(list);
    expect(() => createCodec(false).encode(list)).toThrow(
      "A cycle was detected at $[0]: the array is already being encoded",
    );
  });
});
