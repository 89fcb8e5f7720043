export * from "./simExchangeConnector";
