// pattern: Functional Core

import { describe, expect, it } from "vitest";
import YAML from "yaml";

import { SettingsFileV1 } from "../../config/types/index.js";

import { renderSchema } from "./index.js";

describe("renderSchema", () => {
  it("should pretty-print JSON with 2-space indentation", () => {
    const json = renderSchema(SettingsFileV1, "json");

    expect(json.split("\n")[1]).toMatch(/^ {2}"/);
    expect(JSON.parse(json)).toEqual(JSON.parse(JSON.stringify(SettingsFileV1)));
  });

  it("should produce YAML that parses back to the same schema", () => {
    const yaml = renderSchema(SettingsFileV1, "yaml");

    expect(YAML.parse(yaml)).toEqual(JSON.parse(JSON.stringify(SettingsFileV1)));
  });

  it("should describe the settings file as an object", () => {
    const parsed: unknown = JSON.parse(renderSchema(SettingsFileV1, "json"));

    expect(parsed).toMatchObject({ type: "object" });
    expect(parsed).toHaveProperty("properties.profile");
    expect(parsed).toHaveProperty("properties.sandboxHome");
  });
});
