export { PricingService, PricingConfig, PricingResult, slotOffsetMinutes } from './pricing.service';
export { quoteValidation } from './pricing.validation';
