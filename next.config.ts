import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  output: 'standalone',
  outputFileTracingIncludes: {
    '/api/**': ['./data/seed-movies.json'],
  },
};

export default nextConfig;
