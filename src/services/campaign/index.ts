export {
  CampaignService,
  CampaignServiceDeps,
  PostStatusUpdate,
  ProvisionResult,
  ResumeSummary,
} from './campaign.service';
export { CampaignController, toCampaignDTO, toPostDTO } from './campaign.controller';
export { createCampaignRoutes } from './campaign.routes';
