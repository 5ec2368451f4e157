// pattern: Imperative Shell

import { Command, Option } from "@commander-js/extra-typings";
import YAML from "yaml";

import { SettingsFileV1 } from "../../config/types/index.js";

export type SchemaFormat = "json" | "yaml";

/**
 * Serialize a TypeBox schema in the requested format
 */
export function renderSchema(schema: object, format: SchemaFormat): string {
  return format === "json"
    ? JSON.stringify(schema, null, 2)
    : YAML.stringify(schema);
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeSchemaCommand() {
  return new Command("schema")
    .description("Output the JSON schema for cellblock config files")
    .addOption(
      new Option("-o, --output <format>", "Output format")
        .choices(["json", "yaml"] as const)
        .default("json" as const)
    )
    .addHelpText(
      "after",
      `
Examples:
  cellblock schema                   Output the settings schema as JSON
  cellblock schema -o yaml           Output the settings schema as YAML
  cellblock schema > schema.json     Save the schema for editor integration
      `
    )
    .action(options => {
      // eslint-disable-next-line no-console
      console.log(renderSchema(SettingsFileV1, options.output));
    });
}
