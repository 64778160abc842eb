// src/lib/constants.ts
import type { NodeType } from "./types.js";

export const DEFAULT_CANVAS_TITLE = "Architecture Diagram";
export const CANVAS_ID_PLACEHOLDER = "CANVAS_ID";

/** LLM に見せるノードタイプ説明 */
export const NODE_TYPES: Record<NodeType, string> = {
  api_gateway: "API Gateway service for routing requests",
  load_balancer: "Load balancer (ALB/NLB) for distributing traffic",
  service: "Application service or microservice",
  database: "Database service (RDS, DynamoDB, etc.)",
  queue: "Message queue service (SQS, SNS, etc.)",
  monitoring: "Monitoring service (CloudWatch, X-Ray, etc.)",
};

/** 描画時の既定クラウドサービス名 */
export const CLOUD_SERVICE_OF: Record<NodeType, string> = {
  api_gateway: "API Gateway",
  load_balancer: "ALB",
  service: "EC2",
  database: "RDS",
  queue: "SQS",
  monitoring: "CloudWatch",
};

/** ノードタイプ推定用の同義語 */
export const NODE_TYPE_SYNONYMS: Record<NodeType, string[]> = {
  api_gateway: ["api gateway", "gateway"],
  load_balancer: ["load balancer", "alb", "application load balancer", "nlb"],
  service: ["service", "microservice", "server", "ec2", "ecs", "lambda"],
  database: ["database", "rds", "aurora", "db", "dynamodb"],
  queue: ["queue", "sqs", "sns", "kinesis", "eventbridge"],
  monitoring: ["monitoring", "cloudwatch", "logging", "observability", "xray", "cloudtrail"],
};

/** これらの語が説明文に無ければ monitoring ノードは置かない */
export const MONITORING_KEYWORDS = ["monitoring", "cloudwatch", "observability", "xray", "logging"];

export const ROUTING_TYPES: ReadonlySet<NodeType> = new Set(["api_gateway", "load_balancer"]);
export const SHARED_INFRA_TYPES: ReadonlySet<NodeType> = new Set(["database", "queue", "monitoring"]);

/** クラスタ名の表記ゆれを統一（キーは小文字） */
export const CLUSTER_NAME_STANDARDS: Record<string, string> = {
  microservices: "Microservices",
  services: "Microservices",
  "web tier": "Web Tier",
  web: "Web Tier",
  routing: "Routing",
  "shared infra": "Shared Infra",
  "shared infrastructure": "Shared Infra",
  infrastructure: "Shared Infra",
  infra: "Shared Infra",
  data: "Data Layer",
  "data layer": "Data Layer",
  cache: "Cache Layer",
  "cache layer": "Cache Layer",
};
