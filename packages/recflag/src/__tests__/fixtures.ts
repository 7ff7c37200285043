import { Duration } from "@recflag/flagset";
import { record } from "../builder.js";

export interface TestStruct {
  String: string;
  Int: number;
  Bool: boolean;
  Duration: Duration;
}

export const testStruct = record<TestStruct>("TestStruct")
  .field("String", "string", { json: "string_with_underscores" })
  .field("Int", "int", { json: "number" })
  .field("Bool", "bool", { json: "yes_no" })
  .field("Duration", "duration", { flag: "interval,Some description,5s" })
  .build();

export function sampleStruct(): TestStruct {
  return {
    String: 'some "string" with spaces',
    Int: 42,
    Bool: true,
    Duration: Duration.minutes(1),
  };
}

export function emptyStruct(): TestStruct {
  return { String: "", Int: 0, Bool: false, Duration: Duration.zero };
}
