// backend/services/location/src/repo/mongo/models/state.model.ts
import { Schema, Types, type Connection, type Model } from "mongoose";
import { INDEX_STATE_CODE } from "../../location.store.types";

export interface StateDoc {
  _id: Types.ObjectId;
  countryId: Types.ObjectId;
  name: string;
  code: string;
  /** Number of cities referencing this state; guards restrict-on-delete. */
  cityCount: number;
}

const stateCodeRe = /^[A-Z]{2}-[A-Z0-9]{1,3}$/;

export const StateSchema = new Schema<StateDoc>(
  {
    countryId: {
      type: Schema.Types.ObjectId,
      ref: "Country",
      required: true,
      index: true,
    },
    name: { type: String, required: true, trim: true, maxlength: 100 },
    code: {
      type: String,
      required: true,
      uppercase: true,
      maxlength: 10,
      validate: {
        validator: (v: string) => stateCodeRe.test(v),
        message: "code must be in ISO 3166-2 format",
      },
    },
    cityCount: { type: Number, required: true, default: 0, min: 0 },
  },
  {
    collection: "states",
    strict: true,
    versionKey: false,
    bufferCommands: false,
  }
);

StateSchema.index({ code: 1 }, { unique: true, name: INDEX_STATE_CODE });

export type StateModel = Model<StateDoc>;

export function stateModel(conn: Connection): StateModel {
  return conn.model<StateDoc>("State", StateSchema);
}
