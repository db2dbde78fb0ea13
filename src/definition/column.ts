/**
 * Rendering and conversion rules for one CSV field position.
 */
export interface ColumnDescription {
	/** Header text */
	readonly label: string;
	/** Parse and round the field as a number @default true */
	readonly numerical: boolean;
	/** Rounding precision for numerical columns @default 3 */
	readonly significantDigits: number;
	/** Reserved; carried through but not consulted @default true */
	readonly convert: boolean;
	/** Whether the column appears in the output at all @default true */
	readonly render: boolean;
}

export type ColumnOptions = {
	[K in keyof ColumnDescription]?: ColumnDescription[K] | undefined;
};

export const DEFAULT_COLUMN: ColumnDescription = Object.freeze({
	label: "",
	numerical: true,
	significantDigits: 3,
	convert: true,
	render: true,
});

/**
 * Build a column description from the defaults, overriding only the options
 * that are set.
 */
export function createColumnDescription(
	options: ColumnOptions = {},
): ColumnDescription {
	return {
		label: options.label ?? DEFAULT_COLUMN.label,
		numerical: options.numerical ?? DEFAULT_COLUMN.numerical,
		significantDigits:
			options.significantDigits ?? DEFAULT_COLUMN.significantDigits,
		convert: options.convert ?? DEFAULT_COLUMN.convert,
		render: options.render ?? DEFAULT_COLUMN.render,
	};
}
