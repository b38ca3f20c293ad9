import mysql from "mysql2/promise";
import { env } from "../config/env.js";

export const pool = mysql.createPool({
  uri: env.DATABASE_URL,
  timezone: "Z",
  connectionLimit: 10,
});
