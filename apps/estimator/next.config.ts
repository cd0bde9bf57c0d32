import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  transpilePackages: ["@heatpump-screen/core"],
};

export default nextConfig;
