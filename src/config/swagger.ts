import { Express } from "express";
import swaggerJsdoc from "swagger-jsdoc";
import swaggerUi from "swagger-ui-express";

export function buildSwaggerSpec(publicBaseUrl: string): object {
	const options: swaggerJsdoc.Options = {
		definition: {
			openapi: "3.0.0",
			info: {
				title: "Mail Delivery API",
				version: "1.0.0",
				description: "Campaign dispatch over an SMTP pool with open, click and conversion attribution",
			},
			servers: [
				{
					url: publicBaseUrl,
					description: "Configured public base URL",
				},
			],
			components: {
				schemas: {
					Error: {
						type: "object",
						properties: {
							error: { type: "string" },
							code: { type: "string" },
							details: {
								type: "array",
								items: { type: "string" },
							},
						},
					},
				},
			},
		},
		apis: ["./src/features/**/*.routes.ts"],
	};

	return swaggerJsdoc(options);
}

export function setupSwagger(app: Express, publicBaseUrl: string): void {
	app.use("/api-docs", swaggerUi.serve, swaggerUi.setup(buildSwaggerSpec(publicBaseUrl)));
}
