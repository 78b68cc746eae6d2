/**
 * Unit tests for BaseRegistry.
 *
 * Covers registration order, conflicts and lookup errors.
 */

import { beforeEach, describe, expect, it } from "vitest";
import {
	BaseRegistry,
	RegistryConflictError,
	RegistryNotFoundError,
} from "./base-registry.ts";

interface Panel {
	name: string;
	weight: number;
}

class PanelRegistry extends BaseRegistry<Panel> {
	constructor() {
		super("PanelRegistry");
	}

	register(panel: Panel): void {
		this.registerItem(panel.name, panel);
	}
}

function catchError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	return undefined;
}

describe("BaseRegistry", () => {
	let registry: PanelRegistry;

	beforeEach(() => {
		registry = new PanelRegistry();
	});

	describe("Basic operations", () => {
		it("registers and retrieves items by key", () => {
			const panel: Panel = { name: "outcome", weight: 1 };
			registry.register(panel);

			expect(registry.get("outcome")).toBe(panel);
			expect(registry.has("outcome")).toBe(true);
		});

		it("returns undefined for an unknown key", () => {
			expect(registry.get("missing")).toBeUndefined();
			expect(registry.has("missing")).toBe(false);
		});

		it("lists items in registration order", () => {
			registry.register({ name: "zebra", weight: 1 });
			registry.register({ name: "apple", weight: 2 });
			registry.register({ name: "mango", weight: 3 });

			expect(registry.list().map((p) => p.name)).toEqual(["zebra", "apple", "mango"]);
		});

		it("returns sorted keys", () => {
			registry.register({ name: "zebra", weight: 1 });
			registry.register({ name: "apple", weight: 2 });

			expect(registry.keys()).toEqual(["apple", "zebra"]);
		});
	});

	describe("Conflict detection", () => {
		it("throws on a duplicate key", () => {
			registry.register({ name: "dup", weight: 1 });

			const error = catchError(() => registry.register({ name: "dup", weight: 2 }));

			expect(error).toBeInstanceOf(RegistryConflictError);
			if (error instanceof RegistryConflictError) {
				expect(error.key).toBe("dup");
				expect(error.registryName).toBe("PanelRegistry");
				expect(error.message).toBe('PanelRegistry: Key "dup" is already registered');
			}
		});

		it("keeps the first item when a key is registered twice", () => {
			registry.register({ name: "dup", weight: 1 });

			expect(() => registry.register({ name: "dup", weight: 2 })).toThrow(
				RegistryConflictError,
			);
			expect(registry.get("dup")?.weight).toBe(1);
		});
	});

	describe("getOrThrow", () => {
		it("lists available keys in the error", () => {
			registry.register({ name: "beta", weight: 2 });
			registry.register({ name: "alpha", weight: 1 });

			const error = catchError(() => registry.getOrThrow("gamma"));

			expect(error).toBeInstanceOf(RegistryNotFoundError);
			if (error instanceof RegistryNotFoundError) {
				expect(error.availableKeys).toEqual(["alpha", "beta"]);
				expect(error.message).toBe(
					'PanelRegistry: "gamma" not found. Available: alpha, beta',
				);
			}
		});

		it("reports an empty registry", () => {
			expect(() => registry.getOrThrow("any")).toThrow(
				'PanelRegistry: "any" not found. Registry is empty',
			);
		});
	});
});
