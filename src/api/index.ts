export { getAccount, createAccountRoutes } from './account';
export { listDeployments, createDeployment, searchDeployments, createDeploymentRoutes } from './deployments';
export { getApiKey, createApiKey, deleteApiKey, createApiKeyRoutes } from './keys';
export { listOrganizations, createOrganizationRoutes } from './organizations';
export { requestLogger, notFoundHandler, errorHandler } from './middleware';
export { createMockApiRouter } from './router';
