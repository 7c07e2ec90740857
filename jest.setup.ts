// Loaded before every test file so that config/env validates without a .env file.
// Blank rather than deleted, so a local .env cannot fill them back in.
process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret-at-least-32-characters-long!!';
process.env.BHUVAN_GEOCODE_TOKEN = '';
process.env.BHUVAN_LULC_TOKEN = '';
process.env.SOILGRIDS_ENABLED = 'false';
process.env.FARMER_PROFILES_PATH = '';
