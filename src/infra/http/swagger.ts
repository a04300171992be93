import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Player Auth API',
      version: '1.0.0',
      description: 'Player registration, login and bearer-token profile lookup',
    },
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'INVALID_CREDENTIALS',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Invalid email or password',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
        TokenResponse: {
          type: 'object',
          required: ['access_token', 'token_type'],
          properties: {
            access_token: { type: 'string', description: 'Opaque bearer token' },
            token_type: { type: 'string', enum: ['bearer'] },
          },
        },
        ProfileResponse: {
          type: 'object',
          required: ['id', 'email', 'nickname', 'roles'],
          properties: {
            id: { type: 'string' },
            email: { type: 'string', format: 'email' },
            nickname: { type: 'string' },
            avatar_url: { type: 'string', format: 'uri' },
            roles: { type: 'array', items: { type: 'string' }, example: ['player'] },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Registration and login' },
      { name: 'Profile', description: 'Token to profile resolution' },
      { name: 'Health', description: 'Liveness' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

/**
 * OpenAPI document assembled from the `@openapi` blocks in the route files.
 */
export function buildSwaggerSpec(): object {
  return swaggerJsdoc(options);
}
