import { Schema } from "mongoose";

export const themeSettingsSchema = new Schema(
  {
    tenant_id: { type: String, required: true },
    primary_color: { type: String, required: true },
    hero_heading: { type: String, required: true },
    hero_subtext: { type: String, required: true },
    logo_url: { type: String, default: null },
    featured_categories: { type: [String], default: [] }
  },
  { collection: "theme_settings", versionKey: false }
);

themeSettingsSchema.index({ tenant_id: 1 }, { unique: true });
