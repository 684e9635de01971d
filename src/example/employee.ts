import { t } from "../codec/field-types";
import { IgnoreCondition } from "../codec/types";
import { defineType } from "../definers/builders/type";

export class Employee {
  name = "";
  manager: Employee | null = null;
  reports: Employee[] | null = null;
  yearsEmployed = 0;

  get isManager(): boolean {
    return (this.reports?.length ?? 0) > 0;
  }
}

export const employeeType = defineType(Employee)
  .field("name", t.string())
  .field("manager", t.nullable(t.object(() => Employee)), { include: true })
  .field("reports", t.nullable(t.array(t.object(() => Employee))), {
    member: "field",
  })
  .field("yearsEmployed", t.integer())
  .field("isManager", t.boolean(), {
    readOnly: true,
    ignore: IgnoreCondition.Never,
  })
  .build();
