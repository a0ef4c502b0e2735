import "reflect-metadata" // allows the decorator to work
import express from "express"
import "./controllers/Dataset.controller"

// This is the dependency injection container that will allow us to retrieve and resolve some instances from the Dependency Injection container
import { Container } from "inversify"
import { InversifyExpressServer } from "inversify-express-utils"
import cors from "cors"
import { AuthMiddleware, OptionalAuthMiddleware } from "./middleware/Auth.middleware";
import DatasetRepository from "./repos/Dataset.repository"
import DatasetService from "./services/Dataset.service"
import { DATASET_STORAGE, DatasetStorage } from "./interfaces/datasetStorage.interface"

export function buildContainer(storage?: DatasetStorage) {
  const container = new Container({ defaultScope: "Singleton" })

  container.bind(AuthMiddleware).toSelf()
  container.bind(OptionalAuthMiddleware).toSelf()
  if (storage) {
    container.bind<DatasetStorage>(DATASET_STORAGE).toConstantValue(storage)
  } else {
    container.bind<DatasetStorage>(DATASET_STORAGE).to(DatasetRepository)
  }
  container.bind(DatasetService).toSelf()

  return container
}

export function buildApp(container = buildContainer()) {
  const app = express()

  const allowedOrigins = [process.env.APP_ORIGIN || "http://localhost:3000"];

  app.use(cors({ origin: allowedOrigins, credentials: true }))
  app.use(express.json())

  const server = new InversifyExpressServer(
    container,
    null,
    { rootPath: "/api" },
    app
  )

  return server.build()
}
