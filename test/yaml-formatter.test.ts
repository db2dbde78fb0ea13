import yaml from "js-yaml";
import { describe, expect, it } from "vitest";
import { createColumnDescription } from "../src/definition/column.js";
import { createTableDescription } from "../src/definition/table.js";
import { describeTables, toYaml } from "../src/formatters/yaml-formatter.js";

describe("YAML formatter", () => {
	it("dumps nested data with two-space indentation", () => {
		expect(toYaml({ a: { b: 1 }, list: ["x"] })).toBe(
			"a:\n  b: 1\nlist:\n  - x\n",
		);
	});

	it("keeps keys in insertion order", () => {
		expect(toYaml({ z: 1, a: 2 })).toBe("z: 1\na: 2\n");
	});

	it("describes tables with the description's key names", () => {
		const tables = [
			createTableDescription(
				"data",
				"a.csv",
				[
					createColumnDescription({ label: "Name", numerical: false }),
					createColumnDescription({ significantDigits: 5, render: false }),
				],
				{ rowHline: true },
			),
		];

		const output = describeTables(tables);

		expect(output.split("\n")[0]).toBe("tables:");
		expect(yaml.load(output)).toEqual({
			tables: [
				{
					path: "data/a.csv",
					border: true,
					header_hline: true,
					row_hline: true,
					col_count: 2,
					columns: [
						{
							label: "Name",
							numerical: false,
							significant_digits: 3,
							convert: true,
							render: true,
						},
						{
							label: "",
							numerical: true,
							significant_digits: 5,
							convert: true,
							render: false,
						},
					],
				},
			],
		});
	});

	it("describes an empty table list", () => {
		expect(describeTables([])).toBe("tables: []\n");
	});
});
