import * as Joi from 'joi';

// Validated against the whole process.env, so unrelated variables must pass through.
const configSchema = Joi.object({
  DATABASE_URL: Joi.string().uri({ scheme: ['postgres', 'postgresql'] }),
  DB_HOST: Joi.string().default('localhost'),
  DB_PORT: Joi.number().port().default(5432),
  DB_USER: Joi.string(),
  DB_PASSWORD: Joi.string().allow(''),
  DB_NAME: Joi.string(),
})
  .or('DATABASE_URL', 'DB_NAME')
  .unknown(true);

export default configSchema;
