// src/config/google.ts
import { google, sheets_v4 } from 'googleapis';

const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

/** Sheets v4 client authenticated with a service-account key file */
export function createSheetsClient(keyFile: string): sheets_v4.Sheets {
  const auth = new google.auth.GoogleAuth({
    keyFile,
    scopes: SHEETS_SCOPES
  });
  return google.sheets({ version: 'v4', auth });
}
