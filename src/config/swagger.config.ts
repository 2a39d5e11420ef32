import type { FastifyDynamicSwaggerOptions } from '@fastify/swagger';
import type { FastifySwaggerUiOptions } from '@fastify/swagger-ui';

export const swaggerOptions: FastifyDynamicSwaggerOptions = {
  openapi: {
    openapi: '3.0.0',
    info: {
      title: 'Proof-of-Work UTXO Ledger API',
      description: 'A ledger node that builds and signs UTXO transactions, mines them into proof-of-work blocks and verifies blocks and transactions received from other nodes',
      version: '1.0.0',
      license: {
        name: 'MIT',
        url: 'https://opensource.org/licenses/MIT'
      }
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server'
      }
    ],
    tags: [
      {
        name: 'Health',
        description: 'Health check and monitoring endpoints'
      },
      {
        name: 'Blocks',
        description: 'Mining, receiving and fetching blocks'
      },
      {
        name: 'Transactions',
        description: 'Payments from the node wallet and received transactions'
      },
      {
        name: 'Wallet',
        description: 'Node wallet address and spendable outputs'
      }
    ]
  }
};

export const swaggerUiOptions: FastifySwaggerUiOptions = {
  routePrefix: '/docs',
  uiConfig: {
    docExpansion: 'list',
    deepLinking: false
  },
  staticCSP: true,
  transformSpecificationClone: true
};
