export { logger } from "@/monitoring/errorLogger";
