import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  output: "standalone",
  transpilePackages: ["@devsearch/db-schema"],
  serverExternalPackages: ["sharp", "pino", "bcryptjs"],
};

export default nextConfig;
