import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Contacts API: authentication',
      version: '1.0.0',
      description: 'Sign-up, login, refresh-token rotation and email flows',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
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
              example: 'TOKEN_EXPIRED',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Token has expired',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
        TokenPair: {
          type: 'object',
          required: ['accessToken', 'refreshToken', 'tokenType'],
          properties: {
            accessToken: { type: 'string' },
            refreshToken: { type: 'string' },
            tokenType: { type: 'string', example: 'bearer' },
          },
        },
        UserResponse: {
          type: 'object',
          required: ['id', 'username', 'email', 'confirmed'],
          properties: {
            id: { type: 'string', format: 'uuid' },
            username: { type: 'string' },
            email: { type: 'string', format: 'email' },
            confirmed: { type: 'boolean' },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Login, token rotation and logout' },
      { name: 'Email', description: 'Email confirmation and password recovery' },
      { name: 'Users', description: 'Current user' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts', './dist/infra/http/routes/*.js'],
};

export const swaggerSpec = swaggerJsdoc(options);
