// backend/services/location/src/repo/mongo/models/city.model.ts
import { Schema, Types, type Connection, type Model } from "mongoose";
import { INDEX_CITY_CODE_ACTIVE } from "../../location.store.types";

/**
 * City (municipality) document.
 * `code` is unique only among active cities: an abolished or merged
 * municipality keeps its row (isActive = false) and its code may be reused.
 */
export interface CityDoc {
  _id: Types.ObjectId;
  stateId: Types.ObjectId;
  name: string;
  code: string;
  isActive: boolean;
}

const cityCodeRe = /^[0-9]{6}$/;

export const CitySchema = new Schema<CityDoc>(
  {
    stateId: {
      type: Schema.Types.ObjectId,
      ref: "State",
      required: true,
      index: true,
    },
    name: { type: String, required: true, trim: true, maxlength: 100 },
    code: {
      type: String,
      required: true,
      validate: {
        validator: (v: string) => cityCodeRe.test(v),
        message: "code must be a 6-digit number",
      },
    },
    isActive: { type: Boolean, required: true, default: true },
  },
  {
    collection: "cities",
    strict: true,
    versionKey: false,
    bufferCommands: false,
  }
);

// Conditional unique: the partial filter closes the race between validation and commit.
CitySchema.index(
  { code: 1 },
  {
    unique: true,
    name: INDEX_CITY_CODE_ACTIVE,
    partialFilterExpression: { isActive: true },
  }
);

export type CityModel = Model<CityDoc>;

export function cityModel(conn: Connection): CityModel {
  return conn.model<CityDoc>("City", CitySchema);
}
