/**
 * Design document normalization and object collection
 *
 * Flattens the `files → pages → objects` export into one ordered list of
 * design objects, each tagged with its provenance. Missing containers and
 * missing or mistyped fields fall back to defaults; nothing here throws.
 */

import { z } from "zod";
import type { DesignObject, ObjectContext } from "./types/index.js";
import { STYLE_FIELDS } from "./types/index.js";

const recordSchema = z.record(z.unknown());

const pageSchema = z.object({
	objects: recordSchema.catch({}),
});

const fileSchema = z.object({
	pages: recordSchema.catch({}),
});

const documentSchema = z.object({
	files: recordSchema.catch({}),
});

const designObjectSchema = z.object({
	type: z.string().catch(""),
	name: z.string().catch(""),
	width: z.number().finite().catch(0),
	height: z.number().finite().catch(0),
	x: z.number().finite().catch(0),
	y: z.number().finite().catch(0),
	children: z.array(z.coerce.string()).catch([]),
	visible: z.boolean().catch(true),
	locked: z.boolean().catch(false),
	properties: recordSchema.catch({}),
});

/** Raw export as handed over by the extraction step. */
export type DesignDocumentInput = unknown;

function asRecord(value: unknown): Record<string, unknown> {
	const result = recordSchema.safeParse(value);
	return result.success ? result.data : {};
}

/**
 * Normalize one raw object. Style fields are copied only when the source
 * carries the key, since token extraction distinguishes absent from empty.
 */
export function normalizeDesignObject(
	raw: unknown,
	context: ObjectContext,
): DesignObject {
	const source = asRecord(raw);
	const base = designObjectSchema.parse(source);
	const object: DesignObject = { ...base, context };

	for (const field of STYLE_FIELDS) {
		if (Object.hasOwn(source, field)) {
			object[field] = source[field];
		}
	}

	return object;
}

/**
 * Collect every object of the document in file × page × object order.
 * No deduplication and no filtering.
 */
export function collectObjects(document: DesignDocumentInput): DesignObject[] {
	const { files } = documentSchema.parse(asRecord(document));
	const objects: DesignObject[] = [];

	for (const [fileId, fileData] of Object.entries(files)) {
		const { pages } = fileSchema.parse(asRecord(fileData));
		for (const [pageId, pageData] of Object.entries(pages)) {
			const page = pageSchema.parse(asRecord(pageData));
			for (const [objectId, objectData] of Object.entries(page.objects)) {
				objects.push(
					normalizeDesignObject(objectData, {
						file_id: fileId,
						page_id: pageId,
						object_id: objectId,
					}),
				);
			}
		}
	}

	return objects;
}

/** Stable identity of an object across the whole document. */
export function objectKey(context: ObjectContext): string {
	return JSON.stringify([context.file_id, context.page_id, context.object_id]);
}
