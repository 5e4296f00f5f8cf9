/**
 * @see https://docs.aws.amazon.com/AWSCloudFormation/latest/APIReference/API_Stack.html
 */
export interface StackInfo {
  StackName: string;
  StackStatus: string;
  LastUpdatedTime?: string;
  Outputs?: Array<{
    OutputKey: string;
    OutputValue: string;
    Description?: string;
  }>;
  Tags?: Array<{ Key: string; Value: string }>;
}

export interface StackResourceInfo {
  LogicalResourceId: string;
  PhysicalResourceId: string;
  ResourceType: string;
  ResourceStatus: string;
}

/**
 * @see https://docs.aws.amazon.com/AmazonECS/latest/APIReference/API_Service.html
 */
export interface EcsServiceInfo {
  serviceArn: string;
  serviceName: string;
  clusterArn: string;
  status: "ACTIVE" | "DRAINING" | "INACTIVE";
  desiredCount: number;
  runningCount: number;
  pendingCount: number;
  deployments: EcsDeploymentInfo[];
  [key: string]: unknown;
}

export interface EcsDeploymentInfo {
  id: string;
  status: "PRIMARY" | "ACTIVE" | "INACTIVE";
  desiredCount: number;
  runningCount: number;
  failedTasks?: number;
  createdAt: Timestamp;
  updatedAt: Timestamp;
  rolloutState?: "COMPLETED" | "FAILED" | "IN_PROGRESS";
  rolloutStateReason?: string;
}

/**
 * Timestamps are printed as ISO 8601 strings, or as epoch seconds when the
 * CLI is configured with the legacy timestamp format.
 */
export type Timestamp = string | number;

export interface SubnetInfo {
  SubnetId: string;
  CidrBlock: string;
  VpcId: string;
  [key: string]: unknown;
}

/**
 * @see https://docs.aws.amazon.com/acm/latest/APIReference/API_CertificateDetail.html
 */
export interface CertificateInfo {
  CertificateArn: string;
  DomainName: string;
  SubjectAlternativeNames?: string[];
  Status?: string;
}

export interface TaggedResourceInfo {
  ResourceARN: string;
  Tags?: Array<{ Key: string; Value: string }>;
}
