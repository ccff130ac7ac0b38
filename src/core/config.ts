import dotenv from 'dotenv';

dotenv.config();

export const config = {
  airtable: {
    apiKey: process.env.AIRTABLE_PAT || '',
    baseUrl: process.env.AIRTABLE_API_URL || 'https://api.airtable.com/v0',
    consultingBaseId: process.env.AIRTABLE_CONSULTING_BASE_ID || '',
    incidentsTableId: process.env.AIRTABLE_INCIDENTS_TABLE_ID || '',
    policiesTableId: process.env.AIRTABLE_POLICIES_TABLE_ID || '',
    salesBaseId: process.env.AIRTABLE_SALES_BASE_ID || '',
    opportunitiesTableId: process.env.AIRTABLE_OPPORTUNITIES_TABLE_ID || '',
    maxRecords: parseInt(process.env.AIRTABLE_MAX_RECORDS || '100'),
    maxSalesRecords: parseInt(process.env.AIRTABLE_MAX_SALES_RECORDS || '20'),
  },
  mongodb: {
    uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/claims-desk',
    dbName: process.env.MONGODB_DB_NAME || 'claims-desk',
  },
  server: {
    port: parseInt(process.env.PORT || '3002'),
    env: process.env.NODE_ENV || 'development',
  },
  execution: {
    // Timeout settings (in milliseconds)
    fetchTimeoutMs: parseInt(process.env.FETCH_TIMEOUT || '30000'), // 30s per record-store fetch
    httpTimeoutMs: parseInt(process.env.HTTP_TIMEOUT || '30000'),
  },
  chat: {
    maxClaimsPerReply: parseInt(process.env.MAX_CLAIMS_PER_REPLY || '10'),
    maxMessageLength: parseInt(process.env.MAX_MESSAGE_LENGTH || '4000'),
  },
  report: {
    outputDir: process.env.REPORT_OUTPUT_DIR || './reports',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
};

export type AppConfig = typeof config;
