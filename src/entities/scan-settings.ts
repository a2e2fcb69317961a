export const DEFAULT_RESTRICTIVE_CONDITION_KEYS: readonly string[] = [
    "aws:SourceIp",
    "aws:SourceVpc",
    "aws:SourceVpce",
    "aws:VpcSourceIp",
    "aws:SourceAccount",
    "aws:SourceArn",
    "aws:SourceOrgID",
    "aws:PrincipalOrgID",
    "aws:PrincipalAccount",
    "aws:PrincipalArn",
    "aws:ResourceAccount",
    "aws:ResourceOrgID",
    "aws:MultiFactorAuthPresent",
    "iam:PassedToService",
];

/** `modify` leaves Read and List actions out of the unrestricted list. */
export type UnrestrictedAccessLevels = "modify" | "all";

export interface ScanSettings {
    readonly restrictiveConditionKeys: readonly string[];
    readonly notActionScope: readonly string[];
    readonly includeAwsManagedPolicies: boolean;
    readonly catalogPath: string | null;
    readonly unrestrictedAccessLevels: UnrestrictedAccessLevels;
}
