export interface Item {
	id: number;
	name: string;
	description: string | null;
	price: number;
	created_at: string;
	updated_at: string;
}

/**
 * One updatable field of a partial update. `set: false` means the request
 * left the field out; `set: true` carries the supplied value, which may be
 * `null` for nullable fields.
 */
export type FieldChange<T> = { set: false } | { set: true; value: T };

export interface ItemPatch {
	name: FieldChange<string>;
	description: FieldChange<string | null>;
	price: FieldChange<number>;
}
