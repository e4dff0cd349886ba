/**
 * Default listing schema
 * Aliases accept the header names of the Spanish-language source exports
 */

import type { RecordSchema } from "../../types/data-model.js";

export const DEFAULT_LISTING_SCHEMA: RecordSchema = {
  name: "listing",
  fields: [
    { name: "id", type: "string", nullable: false, aliases: ["id_propiedad"] },
    {
      name: "property_type",
      type: "string",
      nullable: false,
      aliases: ["tipo_propiedad"],
      normalize: "title",
    },
    { name: "district", type: "string", nullable: true, aliases: ["comuna"], normalize: "title" },
    { name: "price", type: "number", nullable: false, aliases: ["precio"] },
    { name: "area_m2", type: "number", nullable: false, aliases: ["superficie_m2"] },
    { name: "bedrooms", type: "integer", nullable: true, aliases: ["habitaciones"] },
    { name: "bathrooms", type: "integer", nullable: true, aliases: ["banos"] },
    { name: "status", type: "string", nullable: true, aliases: ["estado"], normalize: "title" },
    {
      name: "publication_date",
      type: "date",
      nullable: false,
      aliases: ["fecha_publicacion"],
    },
    { name: "description", type: "string", nullable: true, aliases: ["descripcion"] },
  ],
};

export const CRITICAL_FIELDS = ["id", "price", "property_type", "area_m2"];
