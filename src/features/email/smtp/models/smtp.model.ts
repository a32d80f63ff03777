import mongoose, { Schema } from "mongoose";

export interface ISmtpServer {
  name: string;
  host: string;
  port: number;
  secure: boolean;
  username?: string;
  password?: string;
  fromEmail?: string;
  fromName?: string;
  priority: number;
  enabled: boolean;
  stats: {
    sent: number;
    failed: number;
    lastUsedAt?: Date;
    lastFailureAt?: Date;
  };
  createdAt: Date;
  updatedAt: Date;
}

const smtpServerSchema = new Schema<ISmtpServer>(
  {
    name: { type: String, required: true, unique: true },
    host: { type: String, required: true },
    port: { type: Number, required: true, default: 587 },
    secure: { type: Boolean, default: false },
    username: { type: String, required: false },
    password: { type: String, required: false },
    fromEmail: { type: String, required: false },
    fromName: { type: String, required: false },
    priority: { type: Number, default: 1 },
    enabled: { type: Boolean, default: true, index: true },
    stats: {
      sent: { type: Number, default: 0 },
      failed: { type: Number, default: 0 },
      lastUsedAt: { type: Date },
      lastFailureAt: { type: Date },
    },
  },
  { timestamps: true }
);

export const SmtpServer = mongoose.model<ISmtpServer>("SmtpServer", smtpServerSchema);
