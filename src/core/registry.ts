/**
 * Component signature registry and atomic-design table
 *
 * The registry is an ordered list: classification walks it front to back
 * and the first entry over its confidence threshold wins, so reordering
 * entries changes results.
 */

import type {
	ComponentSignatureDef,
	DesignCategoryTable,
	SignatureRegistry,
} from "./types/index.js";

function defineSignature(def: ComponentSignatureDef): ComponentSignatureDef {
	return Object.freeze({
		...def,
		namePatterns: Object.freeze([...def.namePatterns]),
		typePatterns: Object.freeze([...def.typePatterns]),
		propertyPatterns: Object.freeze({ ...def.propertyPatterns }),
		structuralPatterns: Object.freeze([...def.structuralPatterns]),
	});
}

export const DEFAULT_SIGNATURE_REGISTRY: SignatureRegistry = Object.freeze([
	defineSignature({
		name: "button",
		namePatterns: ["btn", "button", "cta", "action"],
		typePatterns: ["rectangle", "group"],
		propertyPatterns: { clickable: true, has_text: true },
		structuralPatterns: ["rounded_corners", "background_fill"],
		confidenceThreshold: 0.7,
	}),
	defineSignature({
		name: "input",
		namePatterns: ["input", "field", "textbox", "search"],
		typePatterns: ["rectangle", "text"],
		propertyPatterns: { editable: true, border: true },
		structuralPatterns: ["border", "placeholder_text"],
		confidenceThreshold: 0.8,
	}),
	defineSignature({
		name: "card",
		namePatterns: ["card", "tile", "panel"],
		typePatterns: ["group", "rectangle"],
		propertyPatterns: { has_children: true, background: true },
		structuralPatterns: ["border", "shadow", "padding"],
		confidenceThreshold: 0.6,
	}),
	defineSignature({
		name: "navigation",
		namePatterns: ["nav", "menu", "tab", "breadcrumb"],
		typePatterns: ["group"],
		propertyPatterns: { has_multiple_items: true, horizontal_layout: true },
		structuralPatterns: ["list_structure", "links"],
		confidenceThreshold: 0.7,
	}),
	defineSignature({
		name: "modal",
		namePatterns: ["modal", "dialog", "popup", "overlay"],
		typePatterns: ["group"],
		propertyPatterns: { overlay: true, centered: true },
		structuralPatterns: ["backdrop", "close_button"],
		confidenceThreshold: 0.8,
	}),
]);

export const DEFAULT_DESIGN_CATEGORIES: DesignCategoryTable = Object.freeze({
	atoms: Object.freeze(["button", "input", "icon", "text", "image", "divider"]),
	molecules: Object.freeze([
		"search-bar",
		"form-field",
		"card-header",
		"navigation-item",
	]),
	organisms: Object.freeze([
		"header",
		"footer",
		"sidebar",
		"form",
		"card",
		"modal",
		"table",
	]),
	templates: Object.freeze(["layout", "page", "section", "grid"]),
	pages: Object.freeze(["dashboard", "profile", "settings", "login"]),
});

/** True when the lower-cased name contains one of the entry's name patterns. */
export function matchesNamePattern(
	signature: ComponentSignatureDef,
	lowerName: string,
): boolean {
	return signature.namePatterns.some((pattern) => lowerName.includes(pattern));
}

export function matchesTypePattern(
	signature: ComponentSignatureDef,
	objectType: string,
): boolean {
	return signature.typePatterns.includes(objectType);
}
