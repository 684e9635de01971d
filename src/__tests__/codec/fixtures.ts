import { t } from "../../codec/field-types";
import { IgnoreCondition } from "../../codec/types";
import { defineType } from "../../definers/builders/type";

export class Address {
  street = "";
  city = "";
}

export class Person {
  name = "";
  age = 0;
  born: Date | null = null;
  tags: string[] = [];
  address: Address | null = null;
}

export class Pair {
  left: Address | null = null;
  right: Address | null = null;
}

export class TreeNode {
  label = "";
  parent: TreeNode | null = null;
  children: TreeNode[] = [];
}

export class Settings {
  title: string | null = null;
  count = 0;
  enabled = false;
  label: string | null = null;
  secret = "hidden";
  retries = 3;
}

export class Vector {
  label: string | null = null;

  constructor(
    readonly x: number,
    readonly y: number,
  ) {}
}

export const addressType = defineType(Address)
  .field("street", t.string())
  .field("city", t.string())
  .build();

export const personType = defineType(Person)
  .field("name", t.string())
  .field("age", t.integer())
  .field("born", t.nullable(t.object(() => Date)))
  .field("tags", t.array(t.string()))
  .field("address", t.nullable(t.object(() => Address)))
  .build();

export const pairType = defineType(Pair)
  .field("left", t.nullable(t.object(() => Address)))
  .field("right", t.nullable(t.object(() => Address)))
  .build();

export const treeNodeType = defineType(TreeNode)
  .field("label", t.string())
  .field("parent", t.nullable(t.object(() => TreeNode)))
  .field("children", t.array(t.object(() => TreeNode)))
  .build();

export const settingsType = defineType(Settings)
  .field("title", t.nullable(t.string()))
  .field("count", t.integer())
  .field("enabled", t.boolean())
  .field("label", t.nullable(t.string()), { ignore: IgnoreCondition.Never })
  .field("secret", t.string(), { ignore: IgnoreCondition.Always })
  .field("retries", t.integer(), {
    ignore: IgnoreCondition.WhenWritingDefault,
    defaultValue: 3,
  })
  .build();

export const vectorType = defineType(Vector)
  .field("x", t.integer(), { readOnly: true })
  .field("y", t.integer(), { readOnly: true })
  .field("label", t.nullable(t.string()))
  .constructWith(["x", "y"], ({ x, y }) => new Vector(x, y))
  .build();

export const fixtureTypes = [
  addressType,
  personType,
  pairType,
  treeNodeType,
  settingsType,
  vectorType,
];

export const createPerson = (): Person => {
  const person = new Person();
  person.name = "Ada";
  person.age = 36;
  person.born = new Date("2020-01-02T03:04:05.000Z");
  person.tags = ["x", "y"];
  const address = new Address();
  address.street = "Main";
  address.city = "Town";
  person.address = address;
  return person;
};
