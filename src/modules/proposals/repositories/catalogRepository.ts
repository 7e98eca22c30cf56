// src/modules/proposals/repositories/catalogRepository.ts
import pool from "../../../db";
import type { AttributeValue, Candidate } from "../types";
import { withPersistence } from "./pgErrors";

type CatalogRow = {
  id: string;
  name: string;
  category: string | null;
  unit_price: string | number | null;
  attributes: Record<string, unknown> | null;
};

function toAttributeValues(raw: Record<string, unknown> | null) {
  const out: Record<string, AttributeValue> = {};
  for (const [name, value] of Object.entries(raw ?? {})) {
    if (typeof value === "string" || typeof value === "number") {
      out[name] = value;
    } else if (value !== null && value !== undefined) {
      out[name] = String(value);
    }
  }
  return out;
}

/**
 * Every catalog item with its attributes and current unit price.
 * Items without a price are listed at 0.
 */
export async function loadCatalogCandidates(): Promise<Candidate[]> {
  return withPersistence("load catalog", async () => {
    const { rows } = await pool.query<CatalogRow>(
      `
      SELECT
        i.id,
        i.name,
        i.category,
        p.unit_price,
        COALESCE(
          (SELECT jsonb_object_agg(a.name, a.value)
           FROM catalog_item_attributes a
           WHERE a.item_id = i.id),
          '{}'::jsonb
        ) AS attributes
      FROM catalog_items i
      LEFT JOIN catalog_item_prices p ON p.item_id = i.id
      ORDER BY i.id ASC
      `
    );

    return rows.map((r) => {
      if (r.unit_price === null) {
        console.warn("catalog: no price for item, using 0", { item_id: r.id });
      }
      return {
        id: r.id,
        name: r.name,
        ...(r.category ? { category: r.category } : {}),
        attributes: toAttributeValues(r.attributes),
        unitPrice: r.unit_price === null ? 0 : Number(r.unit_price),
      };
    });
  });
}
