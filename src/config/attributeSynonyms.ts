// src/config/attributeSynonyms.ts

/**
 * Attribute names that refer to the same property across RFPs and the
 * catalog. Names are compared after normalisation (lowercase, non
 * alphanumerics collapsed to "_").
 */
export const ATTRIBUTE_SYNONYMS: Readonly<Record<string, readonly string[]>> = {
  conductor_material: ["conductor_material", "conductor", "material"],
  conductor_size: ["conductor_size", "size", "cross_section"],
  insulation: ["insulation_type", "insulation", "insulating_material"],
  voltage: ["voltage_grade", "voltage", "rated_voltage", "voltage_rating"],
  cores: ["number_of_cores", "cores", "core_count", "no_of_cores"],
};
