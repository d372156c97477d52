import dotenv from 'dotenv';
import path from 'path';

/**
 * Loads `.env` from the working directory without overriding variables the
 * shell already exported. Only ambient settings live here; the filter
 * pipeline itself reads nothing from the environment.
 */
dotenv.config({
  path: path.resolve(process.cwd(), '.env')
});
const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_PROD = NODE_ENV === 'production';
const IS_TEST = NODE_ENV === 'test';
export const env = {
  NODE_ENV,
  IS_PROD,
  IS_TEST,
  // Tests stay quiet unless a level is asked for explicitly
  LOG_LEVEL: process.env.LOG_LEVEL || (IS_TEST ? 'silent' : 'info')
};

/* ===========================
   DERIVED CONFIG (NO ENV ACCESS)
=========================== */
export const config = {
  defaults: {
    input: 'ZilloZoriCityRaw.csv',
    output: 'data/cleaned_zillow_zori_city.csv',
    cities: ['San Marcos', 'Austin', 'College Station', 'Denton']
  },
  columns: {
    region: 'RegionName',
    county: 'CountyName',
    date: 'Date',
    value: 'Value'
  }
};
