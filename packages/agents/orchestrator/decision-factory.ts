// Factory for department desks and the decision functions bound to each role

import type { Role } from '../types/roles.js';
import type { DecisionFunction } from '../types/decision.js';
import type { BaseDepartment } from '../agents/base-department.js';
import { InvestmentBankingDesk } from '../agents/investment-banking.js';
import { SalesTradingDesk } from '../agents/sales-trading.js';
import { ResearchDesk } from '../agents/research.js';
import { WealthManagementDesk } from '../agents/wealth-management.js';
import { AssetManagementDesk } from '../agents/asset-management.js';
import { RiskComplianceDesk } from '../agents/risk-compliance.js';
import { ExecutiveDesk } from '../agents/executive.js';

/** `rules` = built-in desk; `silent` = never opines (useful to mute a department). */
export type DecisionBinding = 'rules' | 'silent';

const FACTORY: Record<Role, () => BaseDepartment> = {
  investment_banking: () => new InvestmentBankingDesk(),
  sales_trading: () => new SalesTradingDesk(),
  research: () => new ResearchDesk(),
  wealth_management: () => new WealthManagementDesk(),
  asset_management: () => new AssetManagementDesk(),
  risk_compliance: () => new RiskComplianceDesk(),
  executive: () => new ExecutiveDesk(),
};

export function createDepartment(role: Role): BaseDepartment {
  return FACTORY[role]();
}

const silent: DecisionFunction = () => ({});

export function createDecisionFunction(role: Role, binding: DecisionBinding = 'rules'): DecisionFunction {
  return binding === 'silent' ? silent : createDepartment(role).decide;
}
