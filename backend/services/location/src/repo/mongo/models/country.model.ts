// backend/services/location/src/repo/mongo/models/country.model.ts
import { Schema, Types, type Connection, type Model } from "mongoose";
import { INDEX_COUNTRY_CODE } from "../../location.store.types";

export interface CountryDoc {
  _id: Types.ObjectId;
  name: string;
  code: string;
  /** Number of states referencing this country; guards restrict-on-delete. */
  stateCount: number;
}

export const CountrySchema = new Schema<CountryDoc>(
  {
    name: { type: String, required: true, trim: true, maxlength: 100 },
    code: {
      type: String,
      required: true,
      uppercase: true,
      minlength: 2,
      maxlength: 2,
    },
    stateCount: { type: Number, required: true, default: 0, min: 0 },
  },
  {
    collection: "countries",
    strict: true,
    versionKey: false,
    bufferCommands: false,
  }
);

CountrySchema.index({ code: 1 }, { unique: true, name: INDEX_COUNTRY_CODE });

export type CountryModel = Model<CountryDoc>;

export function countryModel(conn: Connection): CountryModel {
  return conn.model<CountryDoc>("Country", CountrySchema);
}
