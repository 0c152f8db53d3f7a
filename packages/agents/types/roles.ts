// Department roles — the closed set of sub-agents inside the brokerage

export const ROLES = [
  'investment_banking',
  'sales_trading',
  'research',
  'wealth_management',
  'asset_management',
  'risk_compliance',
  'executive',
] as const;

export type Role = typeof ROLES[number];

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some(role => role === value);
}

export const ROLE_LABELS: Record<Role, string> = {
  investment_banking: 'Investment Banking',
  sales_trading: 'Sales & Trading',
  research: 'Research',
  wealth_management: 'Wealth Management',
  asset_management: 'Asset Management',
  risk_compliance: 'Risk & Compliance',
  executive: 'Executive Committee',
};

export const ROLE_DESCRIPTIONS: Record<Role, string> = {
  investment_banking: 'Equity and debt underwriting, M&A and financing advisory',
  sales_trading: 'Client order execution, market making and inventory risk',
  research: 'Macro, sector and company research feeding trading and advisory desks',
  wealth_management: 'Allocation and planning for private and retail clients',
  asset_management: 'Fund products, mandates and portfolio construction',
  risk_compliance: 'Risk limits, KYC, regulatory change and compliance review',
  executive: 'Strategy, cross-department coordination and conflict arbitration',
};
