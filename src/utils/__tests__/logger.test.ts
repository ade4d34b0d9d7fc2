import type { IncomingMessage } from "http";
import { describe, expect, it } from "vitest";

import { requestLogProps } from "../logger";

const request = (headers: IncomingMessage["headers"]) => ({ headers }) as IncomingMessage;

describe("requestLogProps", () => {
  it("lifts the caller identity out of the headers", () => {
    expect(requestLogProps(request({ "x-caller-id": "s1", "x-role": "Student" }))).toEqual({ callerId: "s1", role: "student" });
  });

  it("leaves the fields unset for anonymous requests", () => {
    expect(requestLogProps(request({}))).toEqual({ callerId: undefined, role: undefined });
  });
});
